import { MediaAssetDescriptor, MediaModality } from "../domain/types.js";
import { TaskQueue } from "../infra/queue/taskQueue.js";
import { IngestionService } from "./ingestionService.js";

/** Fire-and-forget hand-off from the crawler to the ingestion pipeline. */
export interface IngestionDispatcher {
  dispatchText(content: string, sourceUrl: string): void;
  dispatchMedia(asset: MediaAssetDescriptor, sourceUrl: string, modality: MediaModality): void;
}

export type IngestionTasks = {
  ingest_text: { content: string; sourceUrl: string };
  ingest_media: { asset: MediaAssetDescriptor; sourceUrl: string; modality: MediaModality };
};

export function registerIngestionTasks(
  queue: TaskQueue<IngestionTasks>,
  ingestion: IngestionService,
): void {
  queue.register("ingest_text", (args) => ingestion.ingestText(args.content, args.sourceUrl));
  queue.register("ingest_media", (args) =>
    ingestion.ingestMedia(args.asset, args.sourceUrl, args.modality),
  );
}

export class QueueIngestionDispatcher implements IngestionDispatcher {
  constructor(private readonly queue: TaskQueue<IngestionTasks>) {}

  dispatchText(content: string, sourceUrl: string): void {
    // Outcomes are recorded by the queue; callers wait through onIdle().
    void this.queue.submit({ name: "ingest_text", args: { content, sourceUrl } });
  }

  dispatchMedia(asset: MediaAssetDescriptor, sourceUrl: string, modality: MediaModality): void {
    void this.queue.submit({
      name: "ingest_media",
      args: { asset, sourceUrl, modality },
      idempotencyKey: `${modality}:${asset.url}`,
    });
  }
}
