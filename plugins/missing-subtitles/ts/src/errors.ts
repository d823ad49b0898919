/**
 * Acquisition error taxonomy
 */

export type AcquisitionErrorKind =
  | 'authentication'
  | 'rate-limited'
  | 'not-found'
  | 'quota-exhausted'
  | 'transient-network'
  | 'local-write'
  | 'initialization';

export class AcquisitionError extends Error {
  kind: AcquisitionErrorKind;

  constructor(kind: AcquisitionErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AcquisitionError';
    this.kind = kind;
  }
}
