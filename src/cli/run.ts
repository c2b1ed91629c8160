import { emitStaticAsserts } from "../backend/c-types.ts";
import type { Diagnostic } from "../errors/index.ts";
import { error, formatDiagnostic, Severity } from "../errors/index.ts";
import { checkStandardMinimums } from "../models/descriptions.ts";
import { ALL_DATA_MODELS, DataModel, type DataModelValue } from "../models/kinds.ts";
import { parseDataModel } from "../models/parse.ts";
import { guessDataModel } from "../models/registry.ts";
import { formatModelDetails, formatSizeTable } from "./format.ts";

export const VERSION = "0.1.0";

/** Where the CLI writes: `out` for results, `err` for diagnostics. */
export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

type Command =
  | { kind: "table" }
  | { kind: "model"; model: DataModelValue }
  | { kind: "guess"; intSize: number; longSize: number; pointerSize: number }
  | { kind: "asserts"; model: DataModelValue };

// ─── Argument parsing ────────────────────────────────────────────────────────

function parseModelArg(flag: string, value: string | undefined, diags: Diagnostic[]) {
  if (value === undefined) {
    diags.push(error(`'${flag}' expects a data model name`));
    return undefined;
  }
  const model = parseDataModel(value);
  if (model === undefined) {
    diags.push(error(`unknown data model '${value}'`));
  }
  return model;
}

function parseSizeArg(value: string, diags: Diagnostic[]): number | undefined {
  if (!/^\d+$/.test(value)) {
    diags.push(error(`invalid size '${value}': expected a byte count`));
    return undefined;
  }
  return Number.parseInt(value, 10);
}

function parseArgs(args: readonly string[]): { commands: Command[]; diagnostics: Diagnostic[] } {
  const commands: Command[] = [];
  const diagnostics: Diagnostic[] = [];

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    i++;
    switch (arg) {
      case "--table":
        commands.push({ kind: "table" });
        break;
      case "--model":
      case "--asserts": {
        const model = parseModelArg(arg, args[i], diagnostics);
        i++;
        if (model === undefined) break;
        if (arg === "--model") {
          commands.push({ kind: "model", model });
        } else if (model === DataModel.Unknown) {
          diagnostics.push(error(`cannot emit asserts for data model '${model}'`));
        } else {
          commands.push({ kind: "asserts", model });
        }
        break;
      }
      case "--guess": {
        const raw = args.slice(i, i + 3);
        i += 3;
        if (raw.length < 3) {
          diagnostics.push(error("'--guess' expects three sizes: <int> <long> <pointer>"));
          break;
        }
        const [intSize, longSize, pointerSize] = raw.map((v) => parseSizeArg(v, diagnostics));
        if (intSize === undefined || longSize === undefined || pointerSize === undefined) break;
        commands.push({ kind: "guess", intSize, longSize, pointerSize });
        break;
      }
      default:
        diagnostics.push(
          error(arg.startsWith("-") ? `unknown flag '${arg}'` : `unexpected argument '${arg}'`)
        );
    }
  }

  return { commands, diagnostics };
}

// ─── Output ──────────────────────────────────────────────────────────────────

/** Print all diagnostics. Returns the error count. */
function reportDiagnostics(diagnostics: readonly Diagnostic[], io: CliIo): number {
  let errorCount = 0;
  for (const diag of diagnostics) {
    io.err(formatDiagnostic(diag));
    if (diag.severity === Severity.Error) errorCount++;
  }
  return errorCount;
}

export function helpText(): string {
  return `datamodels ${VERSION} — C data model size lookup

Usage: datamodels [options]

Options:
  --table                        Print the size table of every data model
  --model <NAME>                 Print the sizes and background of one model
  --guess <INT> <LONG> <POINTER> Guess the model from byte sizes
  --asserts <NAME>               Emit C _Static_assert lines for a model
  --help, -h                     Show this help message
  --version, -V                  Show the version

Examples:
  datamodels --model LP64
  datamodels --guess 4 4 8`;
}

function execute(command: Command, io: CliIo): Diagnostic[] {
  switch (command.kind) {
    case "table":
      for (const line of formatSizeTable(ALL_DATA_MODELS)) io.out(line);
      return [];
    case "model":
      for (const line of formatModelDetails(command.model)) io.out(line);
      return checkStandardMinimums(command.model);
    case "guess":
      io.out(guessDataModel(command.intSize, command.longSize, command.pointerSize));
      return [];
    case "asserts":
      io.out(emitStaticAsserts(command.model));
      return [];
  }
}

/** Run the CLI over `args` (without the node and script paths). Returns the exit code. */
export function runCli(args: readonly string[], io: CliIo): number {
  if (args.includes("--help") || args.includes("-h")) {
    io.out(helpText());
    return 0;
  }

  if (args.includes("--version") || args.includes("-V")) {
    io.out(`datamodels ${VERSION}`);
    return 0;
  }

  if (args.length === 0) {
    io.err("error: no option given\n");
    io.err(helpText());
    return 1;
  }

  const { commands, diagnostics } = parseArgs(args);
  const errorCount = reportDiagnostics(diagnostics, io);
  if (errorCount > 0) {
    io.err(`\n${errorCount} error${errorCount !== 1 ? "s" : ""} emitted`);
    return 1;
  }

  for (const command of commands) {
    reportDiagnostics(execute(command, io), io);
  }
  return 0;
}
