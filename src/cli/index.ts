#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { printModule } from "../tir/ir/printer.js";
import { NarrowDataTypePass } from "../tir/passes/narrow_datatype.js";
import { encodeModule, parseModule } from "../tir/serialization/module_codec.js";
import { parseArgs, printHelp } from "./options.js";

async function main() {
  const opts = parseArgs(process.argv.slice(2));

  if (opts.help) {
    printHelp();
    return;
  }
  if (opts.input === null) {
    printHelp();
    process.exitCode = 1;
    return;
  }

  const resolvedInput = path.resolve(opts.input);
  if (!fs.existsSync(resolvedInput)) {
    console.error(`Input not found: ${resolvedInput}`);
    process.exitCode = 1;
    return;
  }

  const source = await fs.promises.readFile(resolvedInput, "utf8");
  const module = parseModule(source);
  const pass = new NarrowDataTypePass(opts.targetBits, { verbose: opts.verbose });
  const result = pass.run(module);

  if (opts.verbose) {
    const narrowed = result.reports.reduce(
      (count, report) =>
        count + report.decisions.filter((d) => !d.original.equals(d.resolved)).length,
      0,
    );
    console.warn(
      `Narrowed ${narrowed} variable(s) in ${result.reports.length} function(s) to ${opts.targetBits} bits`,
    );
  }

  const text = opts.print
    ? `${printModule(result.module)}\n`
    : `${JSON.stringify(encodeModule(result.module), null, 2)}\n`;

  if (opts.output === null) {
    process.stdout.write(text);
    return;
  }
  const resolvedOutput = path.resolve(opts.output);
  await fs.promises.mkdir(path.dirname(resolvedOutput), { recursive: true });
  await fs.promises.writeFile(resolvedOutput, text, "utf8");
  if (opts.verbose) {
    console.warn(`Generated: ${resolvedOutput}`);
  }
}

main().catch((err) => {
  if (err instanceof Error) console.error(err.message);
  else console.error(err);
  process.exit(1);
});
