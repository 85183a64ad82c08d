export class ElementsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** An element could not be constructed from the given fields. */
export class ValidationError extends ElementsError {
  readonly field: string;

  constructor(message: string, field: string) {
    super(message);
    this.field = field;
  }
}

export type ParseErrorContext = {
  /** Position of the offending record; undefined for document-level problems. */
  index?: number;
  /** Path of the offending field inside the record, e.g. `data.source`. */
  field?: string;
};

/** An external representation is malformed. */
export class ParseError extends ElementsError {
  readonly index: number | undefined;
  readonly field: string | undefined;

  constructor(message: string, context: ParseErrorContext = {}) {
    super(message);
    this.index = context.index;
    this.field = context.field;
  }
}

/** A get/filter/remove/select query has nothing to match on. */
export class InvalidQueryError extends ElementsError {
  readonly query: Readonly<Record<string, unknown>>;

  constructor(message: string, query: Readonly<Record<string, unknown>>) {
    super(message);
    this.query = query;
  }
}
