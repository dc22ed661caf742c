export class TerminologyRequestError extends Error {
  readonly code = 'terminology_request_failed' as const;

  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'TerminologyRequestError';
  }
}
