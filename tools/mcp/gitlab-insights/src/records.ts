/**
 * Record source: raw GitLab records through the cache, else the fetch engine.
 *
 * Only completed result sets reach the cache. A fetch that fails or is
 * cancelled part-way leaves nothing behind.
 */

import { isRecords, recordsKey, type TtlCache } from "./cache.js";
import { targetKey, type PaginationMode, type RequestDescriptor, type Target } from "./gitlab.js";
import type { FetchEngine } from "./pagination.js";

export interface DescriptorInit {
  operation: string;
  target: Target;
  path: string;
  params?: Record<string, string>;
  pagination?: PaginationMode;
  perPage: number;
}

export function requestDescriptor(init: DescriptorInit): RequestDescriptor {
  return Object.freeze({
    operation: init.operation,
    target: Object.freeze({ ...init.target }),
    path: init.path,
    params: Object.freeze({ ...init.params }),
    pagination: init.pagination ?? "offset",
    perPage: init.perPage,
  });
}

export interface RecordSourceOptions {
  engine: FetchEngine;
  cache: TtlCache;
  ttlMs: number;
}

export class RecordSource {
  constructor(private readonly options: RecordSourceOptions) {}

  /** Page size is left out of the key: any page size yields the same records. */
  async list(descriptor: RequestDescriptor, signal?: AbortSignal): Promise<readonly unknown[]> {
    const key = recordsKey(descriptor.operation, targetKey(descriptor.target), {
      path: descriptor.path,
      params: descriptor.params,
      pagination: descriptor.pagination,
    });
    const value = await this.options.cache.getOrCompute(
      key,
      this.options.ttlMs,
      async () => {
        const result = await this.options.engine.fetchAll(descriptor, signal);
        return { kind: "records" as const, records: result.records };
      },
      isRecords
    );
    return value.records;
  }

  async one(operation: string, target: Target, path: string, signal?: AbortSignal): Promise<unknown> {
    const key = recordsKey(operation, targetKey(target), { path });
    const value = await this.options.cache.getOrCompute(
      key,
      this.options.ttlMs,
      async () => {
        const record = await this.options.engine.fetchOne(operation, path, signal);
        return { kind: "records" as const, records: [record] };
      },
      isRecords
    );
    return value.records[0];
  }
}
