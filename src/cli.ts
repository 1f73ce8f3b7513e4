#!/usr/bin/env tsx
import { realpathSync } from "fs";
import { resolve } from "path";
import { pathToFileURL } from "url";
import { parseArgs } from "util";
import { loadConfig, resolveSitePaths } from "./config";
import { loadContent } from "./content/load";
import { toPosixRelative } from "./fs";
import { buildInventory, formatInventory } from "./inventory";
import { RULES, RULE_IDS } from "./lint/model";
import { countBySeverity, lintSite } from "./lint/run";
import {
  formatFindings,
  formatFindingsJson,
  formatMissingVariableWarning,
  formatSummary,
} from "./report";
import { createContent } from "./scaffold/archetype";
import { loadSiteConfig, siteSettings } from "./site/load";

export const USAGE = `Usage:
  contentkit check [--root dir] [--name file] [--format text|json] [--no-color]
  contentkit list [--root dir] [--section name] [--name file] [--all] [--format text|json]
  contentkit new <section/slug.md> [--root dir] [--title "Title"]
  contentkit rules`;

export interface CliEnvironment {
  cwd?: string;
  now?: Date;
  color?: boolean;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      root: { type: "string", short: "r" },
      name: { type: "string" },
      section: { type: "string" },
      title: { type: "string", short: "t" },
      format: { type: "string", default: "text" },
      all: { type: "boolean", short: "a" },
      "no-color": { type: "boolean" },
    },
    allowPositionals: true,
  });
}

type CliValues = ReturnType<typeof parseCliArgs>["values"];

async function runCheck(root: string, values: CliValues, env: CliEnvironment): Promise<number> {
  const { findings, documentCount } = await lintSite({ root, name: values.name, now: env.now });

  if (values.name && documentCount === 0) {
    console.error(`No document matched --name "${values.name}"`);
    return 1;
  }

  const counts = countBySeverity(findings);
  if (values.format === "json") {
    console.log(formatFindingsJson(findings, documentCount));
  } else {
    const color = !values["no-color"] && (env.color ?? false);
    if (findings.length > 0) {
      console.log(formatFindings(findings, { color }));
      console.log("");
    }
    console.log(formatSummary(counts, documentCount, { color }));
  }
  return counts.error > 0 ? 1 : 0;
}

async function runList(root: string, values: CliValues, env: CliEnvironment): Promise<number> {
  const config = await loadConfig(root);
  const paths = resolveSitePaths(root, config);
  const { config: site } = await loadSiteConfig(paths.root, config.siteConfig);
  const documents = await loadContent({
    contentDir: paths.contentDir,
    source: config.source,
    ignore: config.ignore,
  });

  const entries = buildInventory(documents, siteSettings(site), {
    section: values.section,
    name: values.name,
    all: values.all,
    now: env.now,
  });

  console.log(values.format === "json" ? JSON.stringify(entries, null, 2) : formatInventory(entries));
  return 0;
}

async function runNew(root: string, target: string | undefined, values: CliValues, env: CliEnvironment): Promise<number> {
  if (!target) {
    console.error("Missing content path, e.g. contentkit new posts/my-post.md");
    return 1;
  }

  const config = await loadConfig(root);
  const created = await createContent({ root, target, title: values.title, now: env.now, config });
  if (created.missingVariables.length > 0) {
    const archetype = toPosixRelative(root, created.archetype);
    console.warn(formatMissingVariableWarning(`archetype ${archetype}`, created.missingVariables));
  }
  console.log(`Created ${toPosixRelative(root, created.path)}`);
  return 0;
}

function runRules(): number {
  const width = Math.max(...RULE_IDS.map((id) => id.length));
  for (const id of RULE_IDS) {
    const rule = RULES[id];
    console.log(`${id.padEnd(width)}  ${rule.severity.padEnd(7)}  ${rule.description}`);
  }
  return 0;
}

/** Run a command and return the process exit code */
export async function runCli(argv: string[], env: CliEnvironment = {}): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    return 1;
  }

  const { values, positionals } = parsed;
  const [command, target] = positionals;
  const root = resolve(env.cwd ?? process.cwd(), values.root ?? ".");

  if (!command) {
    console.log(USAGE);
    return 1;
  }
  if (values.format !== "text" && values.format !== "json") {
    console.error(`Unknown format: ${values.format} (expected text or json)`);
    return 1;
  }

  try {
    switch (command) {
      case "check":
        return await runCheck(root, values, env);
      case "list":
        return await runList(root, values, env);
      case "new":
        return await runNew(root, target, values, env);
      case "rules":
        return runRules();
      default:
        console.error(`Unknown command: ${command}`);
        console.error(USAGE);
        return 1;
    }
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  process.exitCode = await runCli(process.argv.slice(2), {
    color: Boolean(process.stdout.isTTY) && !process.env.NO_COLOR,
  });
}
