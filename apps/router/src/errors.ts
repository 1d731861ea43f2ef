export class ProblemFileError extends Error {
  constructor(
    message: string,
    readonly line: number
  ) {
    super(`line ${line}: ${message}`);
    this.name = "ProblemFileError";
  }
}

export class CsvFormatError extends Error {
  constructor(
    message: string,
    readonly file: string,
    readonly row: number
  ) {
    super(`${file} row ${row}: ${message}`);
    this.name = "CsvFormatError";
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
