#!/usr/bin/env node
/**
 * Command-line driver.
 *
 * Usage: cdnf-qmc <canonical|minimize|expand> <input> [options]
 */

import { canonical, toCanonicalForm } from "./canonical";
import type { MinimizeInput } from "./input";
import { alternatives, minimize } from "./minimize";
import type { Result } from "./result";

type Command = "canonical" | "minimize" | "expand";

type CliOptions = {
  command: Command;
  input: string;
  highOrderFirst: boolean;
  prefix: boolean;
  dontCares: string[];
  showAlternatives: boolean;
  maxSteps: number | undefined;
  verbose: boolean;
  fill: boolean;
};

const COMMANDS: readonly Command[] = ["canonical", "minimize", "expand"];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some(command => command === value);
}

function parseArgs(args: string[]): CliOptions | null {
  const [command, ...rest] = args;
  if (!isCommand(command)) {
    if (command !== undefined && command !== "-h" && command !== "--help") {
      console.error(`Error: Unknown command '${command}'`);
    }
    return null;
  }

  const options: CliOptions = {
    command,
    input: "",
    highOrderFirst: true,
    prefix: false,
    dontCares: [],
    showAlternatives: false,
    maxSteps: undefined,
    verbose: false,
    fill: false,
  };
  const positional: string[] = [];

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i] ?? "";
    if (arg === "--low-order-first") {
      options.highOrderFirst = false;
    } else if (arg === "--prefix") {
      options.prefix = true;
    } else if (arg === "--alternatives") {
      options.showAlternatives = true;
    } else if (arg === "--verbose") {
      options.verbose = true;
    } else if (arg === "--fill") {
      options.fill = true;
    } else if (arg === "--dont-care" || arg === "--max-steps") {
      const value = rest[++i];
      if (value === undefined) {
        console.error(`Error: ${arg} requires a value`);
        return null;
      }
      if (arg === "--dont-care") {
        options.dontCares = value.split(",").map(item => item.trim()).filter(item => item !== "");
      } else {
        const steps = Number(value);
        if (!Number.isSafeInteger(steps) || steps < 0) {
          console.error(`Error: --max-steps expects a non-negative integer, got '${value}'`);
          return null;
        }
        options.maxSteps = steps;
      }
    } else if (arg.startsWith("--")) {
      console.error(`Error: Unknown option '${arg}'`);
      return null;
    } else {
      positional.push(arg);
    }
  }

  if (positional.length === 0) {
    console.error("Error: No input specified");
    return null;
  }
  options.input = positional.join(" ");
  return options;
}

function printUsage(): void {
  console.log(`Canonical forms and Quine-McCluskey minimization

Usage: cdnf-qmc <command> <input> [options]

Commands:
  canonical <n>            Canonical DNF of truth-table value n
  minimize <n|expression>  Minimized sum of products
  expand <expression>      A canonical form of a sum of products

Options:
  --low-order-first        Make A the low-order bit (canonical, minimize)
  --prefix                 Prepend "f(n) = " (canonical)
  --dont-care <list>       Comma-separated indices or minterms (minimize)
  --alternatives           Also print equally short covers (minimize)
  --max-steps <n>          Limit the combination search (minimize)
  --verbose                Trace the minimization on stderr (minimize)
  --fill                   Add letters missing from the range used (expand)
  -h, --help               Show this help message

Examples:
  cdnf-qmc canonical 248
  cdnf-qmc minimize 743 --alternatives
  cdnf-qmc minimize "ABC + A'BC + AB'C + A'B'C + ABC'"
  cdnf-qmc expand "A + BD'" --fill`);
}

const INTEGER = /^\d+$/;

function minimizeInput(options: CliOptions): MinimizeInput | Result<never> {
  const { input, dontCares, highOrderFirst } = options;
  if (dontCares.length === 0) {
    return INTEGER.test(input)
      ? { kind: "integer", value: BigInt(input) }
      : { kind: "expression", expression: input };
  }

  let terms: string[];
  if (INTEGER.test(input)) {
    const form = canonical(BigInt(input), { highOrderFirst });
    if (!form.ok) return form;
    terms = form.out.split(" + ");
  } else {
    terms = input.split(/[^A-Za-z']+/).filter(term => term !== "");
  }
  return {
    kind: "termsWithDontCares",
    terms,
    dontCares: dontCares.every(item => INTEGER.test(item)) ? dontCares.map(item => BigInt(item)) : dontCares,
  };
}

function run(options: CliOptions): Result<string[]> {
  switch (options.command) {
    case "canonical": {
      const value = INTEGER.test(options.input) ? BigInt(options.input) : -1;
      const form = canonical(value, { highOrderFirst: options.highOrderFirst, includePrefix: options.prefix });
      return form.ok ? { ok: true, out: [form.out] } : form;
    }
    case "expand": {
      const form = toCanonicalForm(options.input, { expandMissingLetters: options.fill });
      return form.ok ? { ok: true, out: [form.out] } : form;
    }
    case "minimize": {
      const input = minimizeInput(options);
      if ("ok" in input) return input;
      const details = minimize(input, {
        highOrderFirst: options.highOrderFirst,
        returnDetails: true,
        maxCombinationSteps: options.maxSteps,
        log: options.verbose ? message => console.error(message) : undefined,
      });
      if (!details.ok) return details;
      const { result, terms, alternatives: found } = details.out;
      return { ok: true, out: options.showAlternatives ? [result, ...alternatives(terms, found)] : [result] };
    }
  }
}

/** Runs the CLI with arguments after the script path and returns the exit code. */
export function main(args: string[]): number {
  const options = parseArgs(args);
  if (!options) {
    printUsage();
    return 1;
  }

  const result = run(options);
  if (!result.ok) {
    console.error(`Error: ${result.error.message}`);
    return 1;
  }
  result.out.forEach(line => console.log(line));
  return 0;
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
