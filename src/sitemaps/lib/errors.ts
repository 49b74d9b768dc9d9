/**
 * Problems with a single data row. These never stop an input from being
 * processed: `MissingURL` and `InvalidURL` drop the row, `InvalidDate` drops
 * only the row's last-modified date.
 */
export type ValidationErrorKind = 'MissingURL' | 'InvalidURL' | 'InvalidDate';

/**
 * Problems which prevent any output from being produced for an input. The
 * rest of the run is unaffected.
 */
export type InputErrorKind =
  | 'EmptyHeader'
  | 'MissingURLColumn'
  | 'DuplicateColumn'
  | 'MalformedCSV'
  | 'Unreadable'
  | 'RecordTooLarge'
  | 'InvalidName'
  | 'NameConflict'
  | 'EmptyDocument';

export class ValidationError extends Error {
  readonly kind: ValidationErrorKind;

  constructor(kind: ValidationErrorKind, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.kind = kind;
  }
}

export class InputError extends Error {
  readonly kind: InputErrorKind;

  constructor(kind: InputErrorKind, message: string) {
    super(message);
    this.name = 'InputError';
    this.kind = kind;
  }
}

/**
 * Raised by the document builder when an input has no valid records, meaning
 * no document should be emitted for it.
 */
export class EmptyDocumentError extends InputError {
  constructor(baseName: string) {
    super('EmptyDocument', `no valid URLs found for ${baseName}`);
    this.name = 'EmptyDocumentError';
  }
}

/**
 * Raised before any generation begins if the settings for the run are
 * unusable. Fatal to the entire run.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
