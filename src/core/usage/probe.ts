/**
 * Asynchronous disk usage probe
 *
 * Traversal runs on async fs calls, so callers never wait on a large tree.
 * The last request for a path wins: an older in-flight request for the same
 * path is aborted, resolves to null and reports nothing.
 */

import * as path from "node:path";
import { createLogger } from "../../utils/logger";
import { measureTree } from "../archive/file-collector";
import { errorMessage } from "../errors";

const log = createLogger("usage");

export interface ProbeRequest {
  id: number;
  path: string;
  /** Byte total, or null when cancelled, superseded or failed */
  result: Promise<number | null>;
  cancel(): void;
}

export type UsageReporter = (path: string, bytes: number) => void;

interface InFlight {
  id: number;
  controller: AbortController;
}

export class DiskUsageProbe {
  private nextId = 1;
  private inFlight = new Map<string, InFlight>();

  constructor(private readonly report: UsageReporter = () => {}) {}

  estimateSize(targetPath: string): ProbeRequest {
    const key = path.resolve(targetPath);
    const id = this.nextId++;
    const controller = new AbortController();

    this.inFlight.get(key)?.controller.abort();
    this.inFlight.set(key, { id, controller });

    const result = this.measure(key, id, controller.signal);

    return {
      id,
      path: key,
      result,
      cancel: () => {
        controller.abort();
        this.forget(key, id);
      },
    };
  }

  /** Number of paths with a request still running */
  get pending(): number {
    return this.inFlight.size;
  }

  cancelAll(): void {
    for (const { controller } of this.inFlight.values()) {
      controller.abort();
    }
    this.inFlight.clear();
  }

  private async measure(key: string, id: number, signal: AbortSignal): Promise<number | null> {
    try {
      const bytes = await measureTree(key, { signal });
      if (signal.aborted) return null;

      this.forget(key, id);
      this.report(key, bytes);
      return bytes;
    } catch (error) {
      if (signal.aborted) return null;

      this.forget(key, id);
      log.warn(`Size probe failed for ${key}: ${errorMessage(error)}`);
      return null;
    }
  }

  private forget(key: string, id: number): void {
    if (this.inFlight.get(key)?.id === id) {
      this.inFlight.delete(key);
    }
  }
}
