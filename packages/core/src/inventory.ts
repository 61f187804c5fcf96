import { readFile } from 'node:fs/promises';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { InventoryFormatError } from './errors.js';
import type { Component, Inventory, ThreatSignal, Vulnerability } from './types.js';
import { absent, parsePackageUrl, present } from './utils.js';

const componentSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).optional(),
  version: z.string().min(1).optional(),
  ecosystem: z.string().min(1).optional()
});

const edgeSchema = z.object({
  parent: z.string().min(1),
  child: z.string().min(1)
});

const vulnerabilitySchema = z.object({
  id: z.string().min(1),
  severity: z.number().min(0).nullable().optional(),
  componentIds: z.array(z.string().min(1)).min(1)
});

const threatSignalSchema = z.object({
  vulnerabilityId: z.string().min(1),
  exploitProbability: z.number().min(0).max(1).nullable().optional(),
  exploited: z.boolean().optional()
});

export const inventorySchema = z.object({
  components: z.array(componentSchema),
  dependencies: z.array(edgeSchema).default([]),
  roots: z.array(z.string().min(1)).default([]),
  vulnerabilities: z.array(vulnerabilitySchema).default([]),
  threatSignals: z.array(threatSignalSchema).default([])
});

export type InventoryDocument = z.infer<typeof inventorySchema>;

export async function loadInventory(filePath: string): Promise<Inventory> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new InventoryFormatError(filePath, error instanceof Error ? error.message : String(error));
  }

  const ext = path.extname(filePath).toLowerCase();
  let raw: unknown;
  try {
    raw = ext === '.yaml' || ext === '.yml' ? YAML.parse(text) : JSON.parse(text);
  } catch (error) {
    throw new InventoryFormatError(filePath, error instanceof Error ? error.message : String(error));
  }
  return parseInventory(raw, filePath);
}

export function parseInventory(raw: unknown, source = '<inline>'): Inventory {
  const parsed = inventorySchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new InventoryFormatError(source, `${where}: ${issue?.message ?? 'invalid document'}`);
  }
  return toInventory(parsed.data);
}

function toInventory(doc: InventoryDocument): Inventory {
  return {
    components: doc.components.map(toComponent),
    dependencies: doc.dependencies.map((e) => ({ parent: e.parent, child: e.child })),
    roots: [...doc.roots],
    vulnerabilities: doc.vulnerabilities.map(
      (v): Vulnerability => ({
        id: v.id,
        severity: typeof v.severity === 'number' ? present(v.severity) : absent(),
        componentIds: [...v.componentIds]
      })
    ),
    threatSignals: doc.threatSignals.map(
      (s): ThreatSignal => ({
        vulnerabilityId: s.vulnerabilityId,
        exploitProbability: typeof s.exploitProbability === 'number' ? present(s.exploitProbability) : absent(),
        exploited: s.exploited ?? false
      })
    )
  };
}

function toComponent(entry: InventoryDocument['components'][number]): Component {
  const purl = parsePackageUrl(entry.id);
  const purlName = purl ? (purl.namespace ? `${purl.namespace}/${purl.name}` : purl.name) : undefined;
  return {
    id: entry.id,
    name: entry.name ?? purlName ?? entry.id,
    version: entry.version ?? purl?.version ?? 'unknown',
    ecosystem: entry.ecosystem ?? purl?.type ?? 'unknown'
  };
}
