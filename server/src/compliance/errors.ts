export interface FieldIssue {
  field: string;
  message: string;
}

/**
 * A formula entry (or the finished dosage, at index -1) that cannot be
 * turned into a concentration. Raised instead of degrading the result.
 */
export class FormulaValidationError extends Error {
  constructor(
    message: string,
    public entryIndex: number,
    public entryName: string | null,
    public issues: FieldIssue[]
  ) {
    super(message);
    this.name = "FormulaValidationError";
  }
}

export class ReferenceDataError extends Error {
  constructor(
    message: string,
    public source: string,
    public issues: FieldIssue[]
  ) {
    super(message);
    this.name = "ReferenceDataError";
  }
}
