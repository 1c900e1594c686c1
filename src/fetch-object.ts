import { GetObjectCommand, type S3Client } from '@aws-sdk/client-s3'
import crypto from 'node:crypto'

export type ObjectReader = Pick<S3Client, 'send'>

export const fetchObject = async (
  s3: ObjectReader,
  bucket: string,
  key: string
): Promise<Uint8Array> => {
  const resp = await s3.send(new GetObjectCommand({ Bucket: bucket, Key: key }))
  if (!resp.Body) throw new Error(`Empty body for s3://${bucket}/${key}`)

  const bytes = await resp.Body.transformToByteArray()

  /* --- log a hash so a stored record can be traced to its upload --- */
  console.log('Fetched object', {
    key,
    size: bytes.byteLength,
    contentType: resp.ContentType,
    sha256: crypto.createHash('sha256').update(bytes).digest('hex')
  })

  return bytes
}
