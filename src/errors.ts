export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Required environment is missing or malformed; raised at cold start. */
export class ConfigurationError extends PipelineError {}

/** The notification carried no usable S3 records. */
export class MalformedEventError extends PipelineError {}

/** A `.txt` upload is not valid UTF-8. */
export class DecodingError extends PipelineError {}

/** Bedrock answered without a usable tool-use payload. */
export class InferenceError extends PipelineError {}
