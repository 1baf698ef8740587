import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { z } from "zod";

import { ConflictError, errorMessage, ValidationError } from "../errors.ts";
import { formatZodIssue } from "../json/schema.ts";
import { getLogger } from "../log/logger.ts";
import {
  ClusterSnapshotSchema,
  DraftSchema,
  emptyRegistry,
  RecordsDocumentSchema,
  RegistrySchema,
} from "./schemas.ts";
import type { ClusterSnapshot, Draft, RecordsDocument, Registry } from "./schemas.ts";

const log = getLogger({ module: "store" });

export const RECORDS_FILE = "records.json";
export const CLUSTERS_FILE = "clusters.json";
export const DRAFT_FILE = "draft.json";
export const REGISTRY_FILE = "registry.json";

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * JSON documents under one data directory. Every load is schema-checked and
 * every write goes through a temp file and rename, except the draft slot,
 * which is created exclusively.
 */
export class Workspace {
  readonly dataDir: string;

  constructor(dataDir: string) {
    this.dataDir = dataDir;
  }

  path(file: string): string {
    return join(this.dataDir, file);
  }

  private ensureDir(): void {
    mkdirSync(this.dataDir, { recursive: true });
  }

  private read<S extends z.ZodTypeAny>(file: string, schema: S): z.output<S> | null {
    const path = this.path(file);
    if (!existsSync(path)) {
      return null;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf8"));
    } catch (err) {
      throw new ValidationError(`Could not read ${path}`, [errorMessage(err)]);
    }
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      throw new ValidationError(`Invalid ${file}`, [first ? formatZodIssue(first) : "unknown schema error"]);
    }
    return parsed.data;
  }

  private writeAtomic(file: string, value: unknown): void {
    this.ensureDir();
    const path = this.path(file);
    const temp = `${path}.${process.pid}.${Date.now()}.tmp`;
    writeFileSync(temp, `${JSON.stringify(value, null, 2)}\n`, "utf8");
    renameSync(temp, path);
    log.debug({ file }, "wrote document");
  }

  loadRecords(): RecordsDocument {
    return this.read(RECORDS_FILE, RecordsDocumentSchema) ?? { embeddingModel: null, records: [] };
  }

  hasRecords(): boolean {
    return existsSync(this.path(RECORDS_FILE));
  }

  saveRecords(document: RecordsDocument): void {
    this.writeAtomic(RECORDS_FILE, document);
  }

  loadSnapshot(): ClusterSnapshot | null {
    return this.read(CLUSTERS_FILE, ClusterSnapshotSchema);
  }

  saveSnapshot(snapshot: ClusterSnapshot): void {
    this.writeAtomic(CLUSTERS_FILE, snapshot);
  }

  loadRegistry(): Registry {
    return this.read(REGISTRY_FILE, RegistrySchema) ?? emptyRegistry();
  }

  saveRegistry(registry: Registry): void {
    this.writeAtomic(REGISTRY_FILE, registry);
  }

  /** Ids that already have a registry sample entry. */
  analyzedIds(): Set<string> {
    return new Set(this.loadRegistry().samples.map((sample) => sample.id));
  }

  loadDraft(): Draft | null {
    return this.read(DRAFT_FILE, DraftSchema);
  }

  hasDraft(): boolean {
    return existsSync(this.path(DRAFT_FILE));
  }

  /** Fills the single draft slot. Raises ConflictError if it is taken. */
  createDraft(draft: Draft): void {
    this.ensureDir();
    try {
      writeFileSync(this.path(DRAFT_FILE), `${JSON.stringify(draft, null, 2)}\n`, { encoding: "utf8", flag: "wx" });
    } catch (err) {
      if (isErrnoException(err) && err.code === "EEXIST") {
        throw new ConflictError("A draft is already pending. Approve or reject it before starting a new analysis run.");
      }
      throw err;
    }
  }

  deleteDraft(): boolean {
    if (!this.hasDraft()) {
      return false;
    }
    rmSync(this.path(DRAFT_FILE));
    return true;
  }
}
