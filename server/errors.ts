export const REJECTION_REASONS = ['TooLarge', 'EmptyPayload', 'UnsupportedType', 'Malformed'] as const;
export type RejectionReason = (typeof REJECTION_REASONS)[number];

/** Client error: the upload never reaches the model. */
export class ImageRejectedError extends Error {
  readonly status = 400;

  constructor(
    readonly reason: RejectionReason,
    message: string
  ) {
    super(message);
    this.name = 'ImageRejectedError';
  }
}

export class InferenceFailedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InferenceFailedError';
  }
}

export class ModelNotReadyError extends Error {
  constructor(message = 'Model is still loading') {
    super(message);
    this.name = 'ModelNotReadyError';
  }
}

/** The model could not be loaded; the process must not serve traffic. */
export class StartupFailureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StartupFailureError';
  }
}
