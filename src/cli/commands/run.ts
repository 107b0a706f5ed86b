/**
 * Interactive Run Command
 *
 * Guides users through a step-by-step interactive flow to configure
 * and run a team search, optionally against an enemy composition or
 * a guild boss.
 *
 * Uses @clack/prompts for the terminal UI.
 */

import { intro, outro, spinner, log, note } from "@clack/prompts";
import type { CliContext } from "../context";
import {
  PromptCancelledError,
  promptNumber,
  promptString,
  promptConfirm,
  promptCommaList,
  promptSelect,
  type SelectChoice,
} from "../prompts";
import { TEAM_SIZE, type ProgressUpdate } from "../../models/teamTypes";
import type { OptimizeRequest } from "../../calculators/validation";
import { optimizeCounterTeams, optimizeGuildBattle, optimizeTeams } from "../../calculators/optimizer";
import { formatCounterReport, formatGuildBattleReport, formatOptimizationReport } from "../../output/display";

const STRATEGY_CHOICES: SelectChoice[] = [
  { value: "genetic", label: "genetic", hint: "evolve a population of teams" },
  { value: "greedy", label: "greedy", hint: "fill slots with the best next member" },
  { value: "synergy", label: "synergy", hint: "seed teams from element and group clusters" },
  { value: "random", label: "random", hint: "uniform draws from the pool" },
  { value: "exhaustive", label: "exhaustive", hint: "every combination, small pools only" },
];

const MODE_CHOICES: SelectChoice[] = [
  { value: "standard", label: "standard", hint: "best teams overall" },
  { value: "counter", label: "counter", hint: "answer an enemy team" },
  { value: "boss", label: "guild battle", hint: "best teams against a guild boss" },
];

interface GeneralSettings {
  strategy: string;
  count: number;
  topN: number;
  seed?: number;
  useSynergy: boolean;
}

/**
 * Main entry point for interactive run command
 */
export async function printInteractiveRun(ctx: CliContext): Promise<void> {
  intro("cookie-team interactive mode");

  try {
    // Phase 1: search settings
    log.step("Search Configuration");
    const general = await promptGeneralSettings(ctx);

    // Phase 2: team constraints
    log.step("Team Constraints");
    const required = await promptCookieNames(ctx, "Required cookies?", TEAM_SIZE);
    const treasures = await promptTreasureNames(ctx);
    const exclude = await promptCookieNames(ctx, "Exclude cookies?", ctx.repo.size);

    // Phase 3: opponent
    log.step("Battle Mode");
    const mode = await promptSelect("Battle mode?", MODE_CHOICES, "standard");
    const enemy = mode === "counter" ? await promptEnemy(ctx) : [];
    const boss = mode === "boss" ? await promptBoss(ctx) : undefined;

    const s = spinner();
    const onProgress = (update: ProgressUpdate): void => s.message(update.message);

    const request: OptimizeRequest = {
      strategy: general.strategy,
      count: general.count,
      topN: general.topN,
      seed: general.seed,
      useSynergy: general.useSynergy,
      required,
      treasures,
      exclude,
      onProgress,
    };

    s.start("Searching teams...");
    let report: string;
    if (enemy.length > 0) {
      report = formatCounterReport(optimizeCounterTeams({ ...request, enemy }, ctx), 3);
    } else if (boss) {
      report = formatGuildBattleReport(optimizeGuildBattle({ ...request, boss }, ctx), 3);
    } else {
      report = formatOptimizationReport(optimizeTeams(request, ctx), 3);
    }
    s.stop("Search complete!");

    note(`Strategy ${general.strategy}, ${general.count} candidates`, "Settings");
    console.log("");
    console.log(report);

    outro("Done!");
  } catch (error) {
    if (error instanceof PromptCancelledError) {
      outro("Cancelled");
      process.exit(0);
    }
    throw error;
  }
}

/**
 * Phase 1: strategy and search sizes
 */
async function promptGeneralSettings(ctx: CliContext): Promise<GeneralSettings> {
  const { limits } = ctx.config;

  const strategy = await promptSelect("Strategy?", STRATEGY_CHOICES, "genetic");

  const count = parseInt(
    await promptNumber(`Candidate teams? (1-${limits.maxCount})`, {
      defaultValue: limits.defaultCount,
      validator: (v) => {
        const num = parseInt(v, 10);
        if (isNaN(num) || num < 1 || num > limits.maxCount) {
          return `Must be between 1 and ${limits.maxCount}`;
        }
        return true;
      },
    }),
    10
  );

  const topN = parseInt(
    await promptNumber(`Teams to show? (1-${limits.maxTopN})`, {
      defaultValue: limits.defaultTopN,
      validator: (v) => {
        const num = parseInt(v, 10);
        if (isNaN(num) || num < 1 || num > limits.maxTopN) {
          return `Must be between 1 and ${limits.maxTopN}`;
        }
        return true;
      },
    }),
    10
  );

  const seedInput = await promptString("Random seed?", {
    defaultValue: "random",
    placeholder: "random or number",
    validator: (v) => (v.trim() === "random" || /^\d+$/.test(v.trim()) ? true : "Must be a whole number or 'random'"),
  });
  const seed = seedInput.trim() === "random" ? undefined : parseInt(seedInput, 10);

  const useSynergy = await promptConfirm("Score element, group and combo synergy?", true);

  return { strategy, count, topN, seed, useSynergy };
}

/**
 * Comma-separated cookie names, checked against the catalog.
 */
async function promptCookieNames(ctx: CliContext, message: string, max: number): Promise<string[]> {
  return promptCommaList(message, {
    placeholder: "Lemon, Wind Archer",
    validator: (names) => {
      if (names.length > max) return `At most ${max} cookies`;
      const unknown = names.filter((name) => !ctx.repo.find(name));
      return unknown.length > 0 ? `Unknown cookie(s): ${unknown.join(", ")}` : true;
    },
  });
}

async function promptTreasureNames(ctx: CliContext): Promise<string[]> {
  const known = new Set(ctx.reference.treasures.map((t) => t.name.toLowerCase()));
  const max = ctx.config.limits.maxTreasures;
  return promptCommaList("Selected treasures?", {
    placeholder: ctx.reference.treasures
      .slice(0, 2)
      .map((t) => t.name)
      .join(", "),
    validator: (names) => {
      if (names.length > max) return `At most ${max} treasures`;
      const unknown = names.filter((name) => !known.has(name.toLowerCase()));
      return unknown.length > 0 ? `Unknown treasure(s): ${unknown.join(", ")}` : true;
    },
  });
}

/**
 * Phase 3: enemy composition (1-5 cookies)
 */
async function promptEnemy(ctx: CliContext): Promise<string[]> {
  let enemy: string[] = [];
  while (enemy.length === 0) {
    enemy = await promptCookieNames(ctx, "Enemy cookies?", TEAM_SIZE);
    if (enemy.length === 0) log.warn("Enter at least one enemy cookie.");
  }
  return enemy;
}

async function promptBoss(ctx: CliContext): Promise<string> {
  const choices = ctx.reference.bosses.map((b) => ({ value: b.name, label: b.name, hint: b.description }));
  return promptSelect("Which boss?", choices, choices[0]?.value);
}
