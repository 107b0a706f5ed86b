#!/usr/bin/env tsx
/**
 * Cookie Team Optimizer CLI
 *
 * A command-line tool for searching, scoring and countering
 * five-cookie teams, including teams against guild bosses.
 */

import { Command } from "commander";
import { isOptimizerError } from "../errors";
import { initializeContext } from "./context";
import {
  addSearchOptions,
  createProgressLogger,
  toOptimizeRequest,
  type GlobalCliOptions,
  type SearchCliOptions,
} from "./options";
import { parseCommaList } from "./prompts";
import { printOptimize } from "./commands/optimize";
import { printCounter } from "./commands/counter";
import { listBosses, printGuildBattle } from "./commands/guildBattle";
import { printCookieList, type CookieListOptions } from "./commands/cookies";
import { printInteractiveRun } from "./commands/run";

const program = new Command();

program
  .name("cookie-team")
  .description("Cookie team optimizer: search, score and counter five-cookie teams")
  .version("1.0.0")
  .option("--data-dir <path>", "Directory holding the JSON data tables")
  .option("--strict", "Fail when reference tables name unknown cookies")
  .option("-q, --quiet", "Suppress progress output")
  .addHelpText(
    "after",
    `
Examples:
  $ cookie-team optimize                           Genetic search with defaults
  $ cookie-team optimize -s exhaustive -r "Lemon,Wind Archer,Pure Vanilla"
                                                   Enumerate every completion
  $ cookie-team optimize -s greedy --seed 7 -n 3   Reproducible greedy run
  $ cookie-team counter -e "Hollyberry,Pure Vanilla,Dark Cacao"
                                                   Counter an enemy team
  $ cookie-team boss "Living Abyss" -s exhaustive  Teams against a guild boss
  $ cookie-team boss --list                        List guild bosses
  $ cookie-team cookies --role Healing             List healers
  $ cookie-team run                                Interactive mode
`
  );

/**
 * Print an error and exit. Optimizer errors show their code.
 */
function fail(error: unknown): never {
  if (isOptimizerError(error)) {
    console.error("Error:", `[${error.code}] ${error.message}`);
  } else {
    console.error("Error:", error);
  }
  process.exit(1);
}

// ─────────────────────────────────────────────────────────────
// optimize command
// ─────────────────────────────────────────────────────────────
addSearchOptions(
  program.command("optimize").description("Generate, score and rank teams")
).action(async function (this: Command, options: SearchCliOptions) {
  try {
    const globals = this.optsWithGlobals<GlobalCliOptions>();
    const ctx = await initializeContext({
      dataDir: globals.dataDir,
      strict: globals.strict,
      onProgress: globals.quiet ? undefined : (msg) => console.log(msg),
    });
    console.log("");
    printOptimize(ctx, toOptimizeRequest(options, createProgressLogger(globals.quiet)), options.details);
  } catch (error) {
    fail(error);
  }
});

// ─────────────────────────────────────────────────────────────
// counter command
// ─────────────────────────────────────────────────────────────
addSearchOptions(
  program
    .command("counter")
    .description("Analyze an enemy team and rank counter teams")
    .requiredOption("-e, --enemy <names>", "Enemy cookies, 1-5 (comma-separated)")
).action(async function (this: Command, options: SearchCliOptions & { enemy: string }) {
  try {
    const globals = this.optsWithGlobals<GlobalCliOptions>();
    const ctx = await initializeContext({
      dataDir: globals.dataDir,
      strict: globals.strict,
      onProgress: globals.quiet ? undefined : (msg) => console.log(msg),
    });
    console.log("");
    const request = toOptimizeRequest(options, createProgressLogger(globals.quiet));
    printCounter(ctx, { ...request, enemy: parseCommaList(options.enemy) }, options.details);
  } catch (error) {
    fail(error);
  }
});

// ─────────────────────────────────────────────────────────────
// boss command
// ─────────────────────────────────────────────────────────────
addSearchOptions(
  program
    .command("boss")
    .description("Rank teams against a guild battle boss")
    .argument("[name]", "Boss name (case-insensitive)")
    .option("--list", "List the known bosses")
).action(async function (
  this: Command,
  name: string | undefined,
  options: SearchCliOptions & { list?: boolean }
) {
  try {
    const globals = this.optsWithGlobals<GlobalCliOptions>();
    const ctx = await initializeContext({
      dataDir: globals.dataDir,
      strict: globals.strict,
      onProgress: globals.quiet || options.list ? undefined : (msg) => console.log(msg),
    });
    if (options.list || !name) {
      console.log(listBosses(ctx));
      return;
    }
    console.log("");
    const request = toOptimizeRequest(options, createProgressLogger(globals.quiet));
    printGuildBattle(ctx, { ...request, boss: name }, options.details);
  } catch (error) {
    fail(error);
  }
});

// ─────────────────────────────────────────────────────────────
// cookies command
// ─────────────────────────────────────────────────────────────
program
  .command("cookies")
  .description("List the cookie catalog")
  .option("--role <role>", "Only cookies of this role")
  .option("--rarity <rarity>", "Only cookies of this rarity")
  .option("--position <position>", "Only cookies in this position (Front, Middle, Rear)")
  .option("--element <element>", "Only cookies of this element")
  .option("--search <text>", "Name contains text")
  .option("--by-rarity", "Sort highest rarity first")
  .action(async function (this: Command, options: CookieListOptions) {
    try {
      const globals = this.optsWithGlobals<GlobalCliOptions>();
      const ctx = await initializeContext({ dataDir: globals.dataDir, strict: globals.strict });
      printCookieList(ctx, options);
    } catch (error) {
      fail(error);
    }
  });

// ─────────────────────────────────────────────────────────────
// run command (interactive)
// ─────────────────────────────────────────────────────────────
program
  .command("run")
  .description("Interactive mode: configure a search step by step")
  .action(async function (this: Command) {
    try {
      const globals = this.optsWithGlobals<GlobalCliOptions>();
      const ctx = await initializeContext({ dataDir: globals.dataDir, strict: globals.strict });
      await printInteractiveRun(ctx);
    } catch (error) {
      fail(error);
    }
  });

// Default to showing help if no command specified
program.action(() => {
  program.help();
});

await program.parseAsync();
