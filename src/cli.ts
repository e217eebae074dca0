import { readFile } from "node:fs/promises";
import yargs from "yargs";
import { Evaluator } from "./codegen/evaluator.js";
import { Driver, listing, parseDefines, parseSource } from "./driver.js";
import { formatError } from "./errors.js";
import { tokenize } from "./lexer.js";
import { isErr } from "./result.js";
import { describeToken } from "./token.js";

interface Flags {
  verbose: boolean;
  define?: string[];
}

const log = (line: string): void => {
  console.error(line);
};

const load = async (file: string, flags: Flags): Promise<string> => {
  const src = await readFile(file, "utf8");
  if (flags.verbose) {
    for (const tok of tokenize(src)) log(`token ${tok.pos}: ${describeToken(tok)}`);
  }
  return src;
};

const createDriver = (flags: Flags, natives: boolean): Driver | null => {
  const defines = parseDefines(flags.define ?? []);
  if (isErr(defines)) {
    log(defines.e);
    process.exitCode = 1;
    return null;
  }
  return new Driver({
    defines: defines.v,
    natives,
    log: flags.verbose ? log : undefined,
  });
};

const compileFile = async (
  driver: Driver,
  file: string,
  flags: Flags,
): Promise<boolean> => {
  const result = driver.compile(await load(file, flags));
  if (isErr(result)) {
    log(formatError(result.e.error));
    process.exitCode = 1;
    return false;
  }
  if (flags.verbose) listing(driver.instructions()).forEach((line) => log(line));
  return true;
};

const emit = async (file: string, flags: Flags): Promise<void> => {
  const driver = createDriver(flags, false);
  if (!driver) return;
  try {
    if (!await compileFile(driver, file, flags)) return;
    if (!driver.verify()) {
      log("module failed validation");
      process.exitCode = 1;
      return;
    }
    console.log(driver.print());
  } finally {
    driver.dispose();
  }
};

const run = async (file: string, flags: Flags): Promise<void> => {
  const driver = createDriver(flags, true);
  if (!driver) return;
  try {
    if (!await compileFile(driver, file, flags)) return;
    const evaluator = new Evaluator(driver.ctx.module());
    for (const item of driver.items()) {
      if (item.kind !== "expr") continue;
      const value = evaluator.run(item.fn);
      if (isErr(value)) {
        log(formatError(value.e));
        process.exitCode = 1;
        return;
      }
      console.log(value.v);
    }
  } finally {
    driver.dispose();
  }
};

const printAST = async (file: string, flags: Flags): Promise<void> => {
  const ast = parseSource(await load(file, flags));
  if (isErr(ast)) {
    log(formatError(ast.e));
    process.exitCode = 1;
    return;
  }
  console.log(JSON.stringify(ast.v, null, 2));
};

const parse = async (args: string[]): Promise<void> => {
  await yargs(args)
    .scriptName("bl")
    .version("0.1.0")
    .usage("Lagoon expression compiler")
    .options({
      verbose: {
        alias: "v",
        type: "boolean",
        default: false,
        describe: "Log tokens, lowered values and emitted instructions",
      },
      define: {
        alias: "D",
        type: "string",
        array: true,
        describe: "Bind a variable before compiling, as name=value",
      },
    })
    .command(
      "$0 <file>",
      "Compile a source file and print its IR",
      (y) => y.positional("file", { type: "string", demandOption: true }),
      async (argv) => {
        await emit(argv.file, argv);
      },
    )
    .command(
      "run <file>",
      "Compile a source file and evaluate its top-level expressions",
      (y) => y.positional("file", { type: "string", demandOption: true }),
      async (argv) => {
        await run(argv.file, argv);
      },
    )
    .command(
      "ast <file>",
      "Show the AST of a source file",
      (y) => y.positional("file", { type: "string", demandOption: true }),
      async (argv) => {
        await printAST(argv.file, argv);
      },
    )
    .strict()
    .help()
    .exitProcess(false)
    .fail(false)
    .parseAsync();
};

/**
 * Runs the `bl` command line over `args`. Failures are reported as one line
 * on stderr and set `process.exitCode` to 1; nothing here exits the process.
 */
export const cli = async (args: string[]): Promise<void> => {
  try {
    await parse(args);
  } catch (e) {
    log(e instanceof Error ? e.message : String(e));
    process.exitCode = 1;
  }
};
