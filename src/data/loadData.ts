import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import path from "node:path";
import type { z } from "zod";
import type { Cookie, ReferenceData } from "../models/types";
import { InvalidParameterError, UnknownEntityError } from "../errors";
import { CookieRepository } from "./CookieRepository";
import {
  bossFileSchema,
  buildReferenceData,
  catalogFileSchema,
  metaTeamFileSchema,
  synergyFileSchema,
  threatFileSchema,
  treasureFileSchema,
  validateReferenceData,
  type ReferenceDataIssue,
} from "./referenceData";

/**
 * Bundled data directory at the repository root
 */
export const DEFAULT_DATA_DIR = fileURLToPath(new URL("../../data/", import.meta.url));

export const DATA_FILES = {
  catalog: "cookies.json",
  synergy: "synergy.json",
  treasures: "treasures.json",
  threats: "threats.json",
  metaTeams: "meta-teams.json",
  bosses: "bosses.json",
} as const;

export interface LoadDataOptions {
  /** Directory holding the JSON tables */
  dataDir?: string;
  /** Throw on reference entries naming unknown cookies */
  strict?: boolean;
  /** Callback for progress updates */
  onProgress?: (message: string) => void;
}

export interface LoadedData {
  readonly repo: CookieRepository;
  readonly reference: ReferenceData;
  /** Reference entries that name cookies missing from the catalog */
  readonly issues: readonly ReferenceDataIssue[];
}

async function readJsonFile<T>(dataDir: string, fileName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const filePath = path.join(dataDir, fileName);
  const text = await readFile(filePath, "utf8");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidParameterError("dataFile", `${fileName} is not valid JSON: ${reason}`, { file: fileName });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? `${first.path.join(".")}: ${first.message}` : parsed.error.message;
    throw new InvalidParameterError("dataFile", `${fileName} failed validation at ${where}`, { file: fileName });
  }
  return parsed.data;
}

function assertUniqueNames(cookies: readonly Cookie[]): void {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const cookie of cookies) {
    if (seen.has(cookie.name)) duplicates.push(cookie.name);
    seen.add(cookie.name);
  }
  if (duplicates.length > 0) {
    throw new InvalidParameterError("catalog", `Duplicate cookie names: ${duplicates.join(", ")}`, {
      names: duplicates,
    });
  }
}

/**
 * Load the cookie catalog.
 */
export async function loadCatalog(dataDir: string = DEFAULT_DATA_DIR): Promise<CookieRepository> {
  const file = await readJsonFile(dataDir, DATA_FILES.catalog, catalogFileSchema);
  assertUniqueNames(file.cookies);
  return new CookieRepository(file.cookies);
}

/**
 * Load the catalog and every reference table, then validate the
 * table keys against the catalog.
 *
 * Unknown names are reported in `issues`; in strict mode they fail
 * the load instead.
 */
export async function loadData(options: LoadDataOptions = {}): Promise<LoadedData> {
  const { dataDir = DEFAULT_DATA_DIR, strict = false, onProgress = () => {} } = options;

  onProgress(`Loading cookie catalog from ${dataDir}...`);
  const repo = await loadCatalog(dataDir);
  onProgress(`Loaded ${repo.size} cookies.`);

  onProgress("Loading reference tables...");
  const [synergy, treasures, threats, metaTeams, bosses] = await Promise.all([
    readJsonFile(dataDir, DATA_FILES.synergy, synergyFileSchema),
    readJsonFile(dataDir, DATA_FILES.treasures, treasureFileSchema),
    readJsonFile(dataDir, DATA_FILES.threats, threatFileSchema),
    readJsonFile(dataDir, DATA_FILES.metaTeams, metaTeamFileSchema),
    readJsonFile(dataDir, DATA_FILES.bosses, bossFileSchema),
  ]);
  const reference = buildReferenceData({ synergy, treasures, threats, metaTeams, bosses });

  const issues = validateReferenceData(reference, repo);
  if (issues.length > 0) {
    if (strict) {
      const { kind } = issues[0];
      const names = issues.filter((issue) => issue.kind === kind).map((issue) => issue.name);
      throw new UnknownEntityError(kind, "reference data", [...new Set(names)]);
    }
    onProgress(`Warning: ${issues.length} reference entries name unknown cookies or treasures.`);
  }

  return { repo, reference, issues };
}
