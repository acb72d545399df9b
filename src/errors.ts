/**
 * Kinds of structural failure a parse can end with.
 *
 * Unknown boxes and markers are not errors: they are captured opaquely.
 */
export type StructuralErrorKind =
  | 'UnexpectedEof'
  | 'StructuralInconsistency'
  | 'OutOfScopeMarker'
  | 'MissingMandatoryElement';

export interface StructuralErrorDetails {
  /** Absolute byte offset of the offending node or read */
  offset: number;
  /** Box 4CC or marker mnemonic, when known */
  node?: string;
  /** Bytes requested by a failed read (UnexpectedEof only) */
  requested?: number;
}

/**
 * Located error raised by every parser layer.
 *
 * A parse never recovers from one of these; the first error aborts it.
 */
export class StructuralError extends Error {
  readonly kind: StructuralErrorKind;
  readonly offset: number;
  readonly node?: string;
  readonly requested?: number;

  constructor(kind: StructuralErrorKind, detail: string, details: StructuralErrorDetails) {
    const where = details.node !== undefined
      ? `node ${JSON.stringify(details.node)} at offset ${details.offset}`
      : `offset ${details.offset}`;
    super(`${kind}: ${detail} (${where})`);
    this.name = 'StructuralError';
    this.kind = kind;
    this.offset = details.offset;
    this.node = details.node;
    this.requested = details.requested;
  }
}

export function isStructuralError(value: unknown): value is StructuralError {
  return value instanceof StructuralError;
}

export function inconsistency(detail: string, offset: number, node?: string): StructuralError {
  return new StructuralError('StructuralInconsistency', detail, { offset, node });
}

export function missing(detail: string, offset: number, node: string): StructuralError {
  return new StructuralError('MissingMandatoryElement', detail, { offset, node });
}

export function outOfScope(detail: string, offset: number, node: string): StructuralError {
  return new StructuralError('OutOfScopeMarker', detail, { offset, node });
}
