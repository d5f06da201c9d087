/**
 * YamlFileBackend — filesystem RegistryBackend storing YAML files.
 *
 * Layout under the base directory:
 *   datasets/000000.yaml      one file per record
 *   _index/registry.yaml      manifest: nextId, refSeen, ownerIndex
 *
 * Every file is written to a temporary path and renamed into place. An
 * insert is committed once the manifest is written; a record file whose id
 * is not below the manifest's nextId is a leftover of an interrupted
 * insert and is ignored on load.
 */

import { mkdir, readFile, readdir, rename, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import type { DatasetRecord } from '../types/DatasetRecord.js';
import { RegistryErrors } from '../core/errors.js';
import type {
  OwnerIndexEntry,
  RegistryBackend,
  RegistryChange,
  RegistrySnapshot,
} from '../registry/types.js';

const MANIFEST_VERSION = 1;
const RECORDS_DIR = 'datasets';
const MANIFEST_PATH = '_index/registry.yaml';

const datasetRecordSchema = z.object({
  id: z.number().int().nonnegative(),
  datasetRef: z.string().min(1),
  analysisRef: z.string(),
  owner: z.string(),
  isPublic: z.boolean(),
  createdAt: z.string(),
  views: z.number().int().nonnegative(),
  downloads: z.number().int().nonnegative(),
  citations: z.number().int().nonnegative(),
});

const manifestSchema = z.object({
  version: z.literal(MANIFEST_VERSION),
  nextId: z.number().int().nonnegative(),
  refSeen: z.array(z.string()),
  ownerIndex: z.array(
    z.object({
      owner: z.string(),
      ids: z.array(z.number().int().nonnegative()),
    })
  ),
});

type Manifest = z.infer<typeof manifestSchema>;

/**
 * Configuration for YamlFileBackend.
 */
export interface YamlFileBackendConfig {
  /** Directory holding the registry files */
  directory: string;
}

/**
 * File name for a record id.
 */
export function recordFileName(id: number): string {
  return `${String(id).padStart(6, '0')}.yaml`;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '/'}: ${issue.message}`).join('; ');
}

export class YamlFileBackend implements RegistryBackend {
  private readonly directory: string;
  private manifest: Manifest | null = null;

  constructor(config: YamlFileBackendConfig) {
    this.directory = config.directory;
  }

  async load(): Promise<RegistrySnapshot | null> {
    const manifest = await this.readManifest();
    this.manifest = manifest;
    if (!manifest) {
      return null;
    }

    const records: DatasetRecord[] = [];
    for (let id = 0; id < manifest.nextId; id++) {
      records.push(await this.readRecord(id));
    }

    await this.warnAboutOrphans(manifest.nextId);

    return {
      nextId: manifest.nextId,
      records,
      refSeen: [...manifest.refSeen],
      ownerIndex: manifest.ownerIndex.map(entry => ({ owner: entry.owner, ids: [...entry.ids] })),
    };
  }

  async commit(change: RegistryChange): Promise<void> {
    const { record } = change;
    await this.writeYaml(join(RECORDS_DIR, recordFileName(record.id)), record);

    if (change.type === 'insert') {
      const current = this.manifest ?? (await this.readManifest()) ?? emptyManifest();
      const next: Manifest = {
        version: MANIFEST_VERSION,
        nextId: change.nextId,
        refSeen: [...current.refSeen, record.datasetRef],
        ownerIndex: appendOwner(current.ownerIndex, record),
      };
      await this.writeYaml(MANIFEST_PATH, next);
      this.manifest = next;
    }
  }

  private async readManifest(): Promise<Manifest | null> {
    let content: string;
    try {
      content = await readFile(join(this.directory, MANIFEST_PATH), 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        return null;
      }
      throw err;
    }

    const result = manifestSchema.safeParse(parseYaml(content));
    if (!result.success) {
      throw RegistryErrors.corruptState(`${MANIFEST_PATH}: ${describeIssues(result.error)}`);
    }
    return result.data;
  }

  private async readRecord(id: number): Promise<DatasetRecord> {
    const path = join(RECORDS_DIR, recordFileName(id));
    let content: string;
    try {
      content = await readFile(join(this.directory, path), 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        throw RegistryErrors.corruptState(`record file ${path} is missing`);
      }
      throw err;
    }

    const result = datasetRecordSchema.safeParse(parseYaml(content));
    if (!result.success) {
      throw RegistryErrors.corruptState(`${path}: ${describeIssues(result.error)}`);
    }
    return result.data;
  }

  private async warnAboutOrphans(nextId: number): Promise<void> {
    let files: string[];
    try {
      files = await readdir(join(this.directory, RECORDS_DIR));
    } catch (err) {
      if (isMissingFile(err)) return;
      throw err;
    }

    const orphans = files.filter(name => {
      const match = /^(\d+)\.yaml$/.exec(name);
      return match !== null && Number(match[1]) >= nextId;
    });
    if (orphans.length > 0) {
      console.warn(`Ignoring ${orphans.length} uncommitted record file(s): ${orphans.join(', ')}`);
    }
  }

  private async writeYaml(relativePath: string, data: unknown): Promise<void> {
    const target = join(this.directory, relativePath);
    const temp = `${target}.${randomUUID()}.tmp`;
    await mkdir(dirname(target), { recursive: true });
    await writeFile(temp, stringifyYaml(data), 'utf-8');
    await rename(temp, target);
  }
}

function emptyManifest(): Manifest {
  return { version: MANIFEST_VERSION, nextId: 0, refSeen: [], ownerIndex: [] };
}

function appendOwner(index: OwnerIndexEntry[], record: DatasetRecord): OwnerIndexEntry[] {
  if (!index.some(entry => entry.owner === record.owner)) {
    return [...index, { owner: record.owner, ids: [record.id] }];
  }
  return index.map(entry =>
    entry.owner === record.owner ? { owner: entry.owner, ids: [...entry.ids, record.id] } : entry
  );
}

/**
 * Create a YAML file backend rooted at a directory.
 */
export function createYamlFileBackend(directory: string): YamlFileBackend {
  return new YamlFileBackend({ directory });
}
