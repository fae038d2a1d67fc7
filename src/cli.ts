import { parseArgs } from "node:util";
import { loadConfig } from "./lib/config";
import { SUPPORTED_BANKS, type RowError } from "./lib/parsers";
import { unify, type UnifyInput } from "./lib/unify";
import { writeTransactions, type Destination, type TextOutput } from "./lib/writer";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export type CliIO = {
  stdout: TextOutput;
  stderr: TextOutput;
};

export const USAGE = [
  "Usage: bank-unify BANK_TYPE FILENAME [BANK_TYPE FILENAME ...] [-o FILENAME]",
  "",
  "Merge bank statement exports into one CSV with the columns",
  "date,description,amount,source_bank.",
  "",
  "Options:",
  "  -o, --output FILENAME  write to FILENAME instead of standard output",
  "                         (a .xlsx name writes a spreadsheet)",
  "  -h, --help             show this help",
  "",
  `Available bank types: ${SUPPORTED_BANKS.join(", ")}`,
].join("\n");

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type Invocation =
  | { kind: "help" }
  | { kind: "run"; inputs: UnifyInput[]; destination: Destination };

export function parseInvocation(argv: readonly string[]): Invocation {
  const { values, positionals } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      output: { type: "string", short: "o" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) {
    return { kind: "help" };
  }
  if (values.output !== undefined && values.output.trim() === "") {
    throw new UsageError("the output FILENAME must not be empty");
  }
  if (positionals.length === 0) {
    throw new UsageError("at least one BANK_TYPE FILENAME pair is required");
  }
  if (positionals.length % 2 !== 0) {
    throw new UsageError("files arg should be pairs of BANK_TYPE FILENAME");
  }

  const inputs: UnifyInput[] = [];
  for (let i = 0; i < positionals.length; i += 2) {
    inputs.push({ bank: positionals[i], path: positionals[i + 1] });
  }

  return {
    kind: "run",
    inputs,
    destination:
      values.output !== undefined
        ? { kind: "file", path: values.output }
        : { kind: "stdout" },
  };
}

export function formatRowError(rowError: RowError): string {
  return `warning: ${rowError.format} ${rowError.source} row ${rowError.row}: ${rowError.message}`;
}

export async function run(
  argv: readonly string[],
  io: CliIO = { stdout: process.stdout, stderr: process.stderr },
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  let invocation: Invocation;
  try {
    invocation = parseInvocation(argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : "invalid arguments";
    io.stderr.write(`error: ${message}\n\n${USAGE}\n`);
    return EXIT_USAGE;
  }

  if (invocation.kind === "help") {
    io.stdout.write(`${USAGE}\n`);
    return EXIT_OK;
  }

  let debug = false;
  try {
    const config = loadConfig(env);
    debug = config.debug;

    const { transactions, rowErrors } = unify(invocation.inputs, {
      onRowError: (rowError) => io.stderr.write(`${formatRowError(rowError)}\n`),
    });
    await writeTransactions(transactions, invocation.destination, io.stdout);

    if (config.strict && rowErrors.length > 0) {
      io.stderr.write(`error: ${rowErrors.length} row(s) skipped\n`);
      return EXIT_FAILURE;
    }
    return EXIT_OK;
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    io.stderr.write(`error: ${message}\n`);
    if (debug && error instanceof Error && error.stack) {
      io.stderr.write(`${error.stack}\n`);
    }
    return EXIT_FAILURE;
  }
}
