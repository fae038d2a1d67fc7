// Node's fs errors carry a code such as ENOENT or EACCES.
function describeCause(cause: unknown): string {
  if (cause instanceof Error && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  return cause instanceof Error ? cause.message : "unknown error";
}

export class UnsupportedBankError extends Error {
  readonly bank: string;

  constructor(bank: string, supported: readonly string[]) {
    super(
      `unsupported bank type: ${bank} (supported: ${supported.join(", ")})`
    );
    this.name = "UnsupportedBankError";
    this.bank = bank;
  }
}

export class InputFileError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`cannot read ${path}: ${describeCause(cause)}`, { cause });
    this.name = "InputFileError";
    this.path = path;
  }
}

// Header or column-count problems; the file as a whole is unusable.
export class StructuralParseError extends Error {
  readonly format: string;
  readonly source: string;
  readonly row: number | null;

  constructor(
    format: string,
    source: string,
    row: number | null,
    reason: string
  ) {
    super(
      row === null
        ? `${format} ${source}: ${reason}`
        : `${format} ${source} row ${row}: ${reason}`
    );
    this.name = "StructuralParseError";
    this.format = format;
    this.source = source;
    this.row = row;
  }
}

export class OutputFileError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`cannot write ${path}: ${describeCause(cause)}`, { cause });
    this.name = "OutputFileError";
    this.path = path;
  }
}
