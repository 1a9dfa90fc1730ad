#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import type { BatchGeneratorOptions } from "../instantiator/batch/batch_generator.js";
import { AggregateBatchError, BatchGenerator } from "../instantiator/index.js";
import { isClassName } from "../instantiator/model/scene_schema.js";

interface Options {
  inputs: string[];
  output: string;
  className?: string;
  setCommentProperties: boolean;
  verbose: boolean;
}

function parseArgs(argv: string[]): Options {
  const opts: Options = {
    inputs: [],
    output: "output/instantiators",
    setCommentProperties: false,
    verbose: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "-i" || arg === "--input") {
      const value = argv[i + 1];
      if (!value) throw new Error("Missing value for -i/--input");
      opts.inputs.push(value);
      i += 1;
      continue;
    }
    if (arg === "-o" || arg === "--output") {
      const value = argv[i + 1];
      if (!value) throw new Error("Missing value for -o/--output");
      opts.output = value;
      i += 1;
      continue;
    }
    if (arg === "--class-name") {
      const value = argv[i + 1];
      if (!value) throw new Error("Missing value for --class-name");
      if (!isClassName(value)) throw new Error(`Invalid class name: ${value}`);
      opts.className = value;
      i += 1;
      continue;
    }
    if (arg === "--set-comment-properties") {
      opts.setCommentProperties = true;
      continue;
    }
    if (arg === "-v" || arg === "--verbose") {
      opts.verbose = true;
      continue;
    }
    if (arg === "-h" || arg === "--help") {
      printHelp();
      process.exit(0);
    }
    if (!arg.startsWith("-")) {
      opts.inputs.push(arg);
      continue;
    }
    throw new Error(`Unknown option: ${arg}`);
  }

  return opts;
}

function printHelp(): void {
  console.log(`Usage: composition-codegen -i <scene.json|dir> [options]

Options:
  -i, --input <path>          Scene file or directory of scenes (repeatable)
  -o, --output <dir>          Output directory (default: output/instantiators)
  --class-name <name>         Class name of a single generated scene
  --set-comment-properties    Emit Comment assignments
  -v, --verbose               Verbose logging
  -h, --help                  Show this help

Examples:
  composition-codegen -i scenes
  composition-codegen -i scenes/spinner.json --class-name Spinner -o out
`);
}

async function main() {
  const argv = process.argv.slice(2);
  const opts = parseArgs(argv);

  if (opts.inputs.length === 0) {
    printHelp();
    process.exit(1);
  }

  const generator = new BatchGenerator();
  const outDir = path.resolve(opts.output);

  for (const input of opts.inputs) {
    const resolvedInput = path.resolve(input);
    if (!fs.existsSync(resolvedInput)) {
      console.error(`Input not found: ${resolvedInput}`);
      process.exitCode = 1;
      continue;
    }

    if (opts.verbose) {
      console.log(`Generating ${resolvedInput} -> ${outDir}`);
    }

    const options: BatchGeneratorOptions = {
      source: resolvedInput,
      outputDir: outDir,
      className: opts.className,
      setCommentProperties: opts.setCommentProperties,
      verbose: opts.verbose,
    };

    try {
      const result = generator.generate(options);
      if (opts.verbose) {
        for (const o of result.outputs) {
          console.log(`Generated: ${o.outputPath}`);
        }
      }
    } catch (err) {
      console.error(`Error generating ${input}:`);
      if (err instanceof AggregateBatchError) {
        console.error(`${err.failures.length} scene(s) failed`);
      } else if (err instanceof Error) {
        console.error(err.message);
      } else {
        console.error(err);
      }
      process.exitCode = 1;
    }
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
