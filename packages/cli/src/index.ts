#!/usr/bin/env -S node --import tsx
import { realpathSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import fg from 'fast-glob';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import * as core from '@vulnrank/core';
import type { PrioritizationResult, PrioritizeOverrides, PriorityTier } from '@vulnrank/core';

export interface CliDeps {
  mkdir: typeof mkdir;
  writeFile: typeof writeFile;
  expandInventoryPaths: (patterns: string[], cwd: string) => Promise<string[]>;
  loadInventory: typeof core.loadInventory;
  prioritize: typeof core.prioritize;
  shouldFail: typeof core.shouldFail;
  stdout: { write: (text: string) => void; isTTY?: boolean };
  stderr: { write: (text: string) => void };
}

type FailOn = PriorityTier | 'none';

interface RankOutcome {
  inventoryPath: string;
  outputPath?: string;
  result?: PrioritizationResult;
  error?: string;
}

const defaultDeps: CliDeps = {
  mkdir,
  writeFile,
  expandInventoryPaths,
  loadInventory: core.loadInventory,
  prioritize: core.prioritize,
  shouldFail: core.shouldFail,
  stdout: process.stdout,
  stderr: process.stderr
};

export async function runCli(rawArgs: string[], deps: CliDeps = defaultDeps): Promise<number> {
  let exitCode = 0;

  const parser = yargs(rawArgs)
    .scriptName('vulnrank')
    .command(
      'rank <inventory..>',
      'Rank the vulnerabilities of one or more component inventories',
      (cmd) =>
        cmd
          .positional('inventory', {
            type: 'string',
            array: true,
            demandOption: true,
            describe: 'Inventory files (.json, .yaml, .yml) or glob patterns'
          })
          .option('format', {
            choices: ['json', 'none'] as const,
            default: 'json' as const
          })
          .option('out-dir', {
            type: 'string',
            default: path.join(os.tmpdir(), 'vulnrank')
          })
          .option('fail-on', {
            choices: ['critical', 'high', 'medium', 'low', 'none'] as const,
            default: 'none' as const
          })
          .option('bins', {
            type: 'number',
            describe: 'Equal-width bins used to measure the entropy of numeric signals'
          })
          .option('depth-weight', {
            type: 'number',
            describe: 'Share of inverted depth in the topological criticality score'
          })
          .option('centrality-weight', {
            type: 'number',
            describe: 'Share of centrality in the topological criticality score'
          })
          .option('hub-threshold', {
            type: 'number',
            describe: 'Criticality score above which a component is counted as a hub'
          })
          .option('severity-scale', {
            type: 'number',
            describe: 'Maximum of the severity scale (CVSS: 10)'
          })
          .option('exploited-override', {
            type: 'boolean',
            default: true,
            describe: 'Rank exploited vulnerabilities above all others regardless of composite score'
          })
          .option('list', {
            type: 'number',
            default: 0,
            describe: 'Print the top N ranked records'
          }),
      async (argv) => {
        try {
          const overrides = resolveRankSettings({
            bins: argv.bins,
            depthWeight: argv.depthWeight,
            centralityWeight: argv.centralityWeight,
            hubThreshold: argv.hubThreshold,
            severityScale: argv.severityScale,
            exploitedOverride: argv.exploitedOverride
          });
          const inventoryPaths = await deps.expandInventoryPaths(argv.inventory.map(String), process.cwd());
          if (inventoryPaths.length === 0) {
            throw new Error(`No inventory files matched: ${argv.inventory.join(', ')}`);
          }

          const outDir = path.resolve(String(argv.outDir));
          if (argv.format === 'json') {
            await deps.mkdir(outDir, { recursive: true });
          }
          const outputNames = assignOutputNames(inventoryPaths);

          const outcomes = await Promise.all(
            inventoryPaths.map(async (inventoryPath, idx): Promise<RankOutcome> => {
              try {
                const inventory = await deps.loadInventory(inventoryPath);
                const result = deps.prioritize(inventory, overrides);
                if (argv.format !== 'json') return { inventoryPath, result };
                const outputPath = path.join(outDir, outputNames[idx]);
                const payload = { inventory: inventoryPath, generatedAt: new Date().toISOString(), ...result };
                await deps.writeFile(outputPath, JSON.stringify(payload, null, 2));
                return { inventoryPath, outputPath, result };
              } catch (error) {
                return { inventoryPath, error: error instanceof Error ? error.message : String(error) };
              }
            })
          );

          const color = useColor(deps.stdout);
          const failOn: FailOn = argv.failOn;
          let thresholdHit = false;
          let failed = false;

          for (const outcome of outcomes) {
            if (!outcome.result) {
              failed = true;
              deps.stderr.write(`${outcome.inventoryPath}: ${outcome.error ?? 'unknown error'}\n`);
              continue;
            }
            const result = outcome.result;
            const hit = result.records.some((r) => deps.shouldFail(failOn, r.priority));
            thresholdHit = thresholdHit || hit;

            if (outcome.outputPath) deps.stdout.write(`${outcome.outputPath}\n`);
            for (const warning of result.warnings) {
              deps.stderr.write(
                `warning: ${warning.vulnerabilityId} missing ${warning.missing.join(', ')} (${warning.componentIds.join(', ')})\n`
              );
            }
            for (const notice of result.notices) {
              deps.stdout.write(`notice: ${notice.reason}: ${notice.message}\n`);
            }
            deps.stdout.write(buildCliSummary(outcome.inventoryPath, result, failOn, hit, color));
            deps.stdout.write(buildRecordList(result, argv.list, color));
          }

          if (failed) {
            exitCode = 2;
            return;
          }
          exitCode = thresholdHit ? 1 : 0;
        } catch (error) {
          deps.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
          exitCode = 2;
        }
      }
    )
    .demandCommand(1)
    .strict()
    .help();

  await parser.parseAsync();
  return exitCode;
}

if (isMainModule(process.argv[1])) {
  void runCli(hideBin(process.argv)).then((code) => {
    process.exitCode = code;
  });
}

function isMainModule(entry: string | undefined): boolean {
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

export async function expandInventoryPaths(patterns: string[], cwd: string): Promise<string[]> {
  const files = await fg(patterns, {
    cwd,
    absolute: true,
    onlyFiles: true,
    unique: true,
    ignore: ['**/node_modules/**']
  });
  return files.sort();
}

export function resolveRankSettings(input: {
  bins: number | undefined;
  depthWeight: number | undefined;
  centralityWeight: number | undefined;
  hubThreshold: number | undefined;
  severityScale: number | undefined;
  exploitedOverride: boolean | undefined;
}): PrioritizeOverrides {
  const overrides: PrioritizeOverrides = {};

  if (input.depthWeight !== undefined || input.centralityWeight !== undefined) {
    const depthWeight = input.depthWeight ?? 1 - (input.centralityWeight ?? 0.5);
    const centralityWeight = input.centralityWeight ?? 1 - depthWeight;
    overrides.topology = { depthWeight, centralityWeight };
  }
  if (input.hubThreshold !== undefined) {
    overrides.topology = { ...overrides.topology, hubThreshold: input.hubThreshold };
  }
  if (input.bins !== undefined) overrides.entropy = { bins: input.bins };
  if (input.severityScale !== undefined) overrides.severityScale = input.severityScale;
  if (input.exploitedOverride !== undefined) overrides.ranking = { exploitedOverride: input.exploitedOverride };

  // Surfaces bad flag combinations before any inventory is read.
  core.resolveOptions(overrides);
  return overrides;
}

function assignOutputNames(inventoryPaths: string[]): string[] {
  const used = new Set<string>();
  return inventoryPaths.map((inventoryPath) => {
    const base = path.basename(inventoryPath, path.extname(inventoryPath));
    let name = `${base}.ranking.json`;
    for (let n = 2; used.has(name); n += 1) name = `${base}-${n}.ranking.json`;
    used.add(name);
    return name;
  });
}

function buildCliSummary(
  inventoryPath: string,
  result: PrioritizationResult,
  failOn: FailOn,
  thresholdHit: boolean,
  color: boolean
): string {
  const s = result.summary;
  const p = s.byPriority;
  const weights = result.weights
    ? `topology=${fixed(result.weights.topology)} exploit-probability=${fixed(result.weights.exploitProbability)} exploited=${fixed(result.weights.exploited)} severity=${fixed(result.weights.severity)}`
    : 'n/a';
  const lines = [
    '',
    colorize('vulnrank summary', 'cyan', color),
    `inventory: ${inventoryPath}`,
    `components: ${s.componentCount}`,
    `vulnerabilities: ${s.vulnerabilityCount}`,
    `records: ${s.recordCount}`,
    `priority: critical=${colorize(String(p.critical), 'magenta', color)} high=${colorize(String(p.high), 'red', color)} medium=${colorize(String(p.medium), 'yellow', color)} low=${colorize(String(p.low), 'green', color)}`,
    `weights: ${weights}`,
    `max depth: ${s.maxDepth}`,
    `hub components: ${s.hubComponents}`,
    `incomplete signals: ${s.incompleteCount > 0 ? colorize(String(s.incompleteCount), 'yellow', color) : '0'}`,
    `fail-on: ${failOn}`,
    `threshold hit: ${thresholdHit ? colorize('yes', 'red', color) : colorize('no', 'green', color)}`
  ];
  return `${lines.join('\n')}\n`;
}

function buildRecordList(result: PrioritizationResult, limit: number, color: boolean): string {
  if (limit <= 0) return '';
  if (result.records.length === 0) {
    return `\n${colorize('ranked records', 'cyan', color)}\n(no records)\n`;
  }

  const lines = ['', colorize('ranked records', 'cyan', color)];
  for (const record of result.records.slice(0, limit)) {
    const severity = record.rawSeverity === null ? 'n/a' : String(record.rawSeverity);
    lines.push(
      `#${record.rank} ${colorize(record.priority, priorityColor(record.priority), color)} ${fixed(record.composite)}` +
        ` ${record.vulnerabilityId} ${record.componentId}` +
        ` exploited=${record.exploited ? 'yes' : 'no'} exploit-probability=${fixed(record.exploitProbability)}` +
        ` severity=${severity} tcs=${fixed(record.tcs)}`
    );
  }
  return `${lines.join('\n')}\n`;
}

function fixed(n: number): string {
  return n.toFixed(3);
}

function priorityColor(priority: PriorityTier): 'magenta' | 'red' | 'yellow' | 'green' {
  if (priority === 'critical') return 'magenta';
  if (priority === 'high') return 'red';
  if (priority === 'medium') return 'yellow';
  return 'green';
}

function useColor(stdout: { isTTY?: boolean }): boolean {
  return Boolean(stdout.isTTY && !process.env.NO_COLOR);
}

function colorize(text: string, color: 'red' | 'yellow' | 'green' | 'cyan' | 'magenta', enabled: boolean): string {
  if (!enabled) return text;
  const code: Record<typeof color, number> = {
    red: 31,
    yellow: 33,
    green: 32,
    cyan: 36,
    magenta: 35
  };
  return `\u001b[${code[color]}m${text}\u001b[0m`;
}
