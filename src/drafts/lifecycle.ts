import { ConflictError, NotFoundError } from "../errors.ts";
import { getLogger } from "../log/logger.ts";
import { orderedResults } from "../personas/consolidator.ts";
import type { IngestReport, RegistryIngestor } from "../registry/ingestor.ts";
import type { Draft } from "../store/schemas.ts";
import type { Workspace } from "../store/workspace.ts";

const log = getLogger({ module: "drafts" });

export type DraftState = "NONE" | "DRAFT_PENDING";

export type ApproveOptions = {
  force?: boolean;
  dryRun?: boolean;
  now?: Date;
};

/**
 * Single-slot pending state between an analysis run and the registry.
 *
 *   NONE --run-analysis--> DRAFT_PENDING --approve/reject--> NONE
 */
export class DraftLifecycle {
  private workspace: Workspace;
  private ingestor: RegistryIngestor;

  constructor(workspace: Workspace, ingestor: RegistryIngestor) {
    this.workspace = workspace;
    this.ingestor = ingestor;
  }

  state(): DraftState {
    return this.workspace.hasDraft() ? "DRAFT_PENDING" : "NONE";
  }

  assertNone(): void {
    if (this.state() === "DRAFT_PENDING") {
      throw new ConflictError("A draft is already pending. Approve or reject it before starting a new analysis run.");
    }
  }

  create(draft: Draft): void {
    this.workspace.createDraft(draft);
    log.info({ runId: draft.runId, batches: Object.keys(draft.results).length }, "draft created");
  }

  current(): Draft {
    const draft = this.workspace.loadDraft();
    if (!draft) {
      throw new NotFoundError("No draft is pending. Run an analysis first.");
    }
    return draft;
  }

  /**
   * Commits the draft through the ingestor, then clears the slot. A refused
   * ingest (coverage, unknown ids) leaves the draft in place; so does a dry run.
   */
  approve(options: ApproveOptions = {}): IngestReport {
    const draft = this.current();
    const report = this.ingestor.ingest(
      {
        results: orderedResults(draft.results),
        personas: draft.personas,
        mergeEvents: draft.mergeEvents,
        runId: draft.runId,
      },
      { force: options.force, dryRun: options.dryRun, now: options.now },
    );
    if (!options.dryRun) {
      this.workspace.deleteDraft();
      log.info({ runId: draft.runId }, "draft approved");
    }
    return report;
  }

  reject(): Draft {
    const draft = this.current();
    this.workspace.deleteDraft();
    log.info({ runId: draft.runId }, "draft rejected");
    return draft;
  }
}
