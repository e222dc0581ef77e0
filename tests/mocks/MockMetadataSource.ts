/**
 * In-memory MetadataSource keyed by identifier value.
 * Unknown identifiers are not found; identifiers marked as failing return a provider error.
 */

import type {
  FetchResult,
  MetadataRecord,
  MetadataSource,
  SubjectIdentifier,
} from '../../src/types.js';

export class MockMetadataSource implements MetadataSource {
  private records = new Map<string, MetadataRecord>();
  private failing = new Set<string>();
  readonly calls: SubjectIdentifier[] = [];

  add(value: string, record: MetadataRecord): this {
    this.records.set(value, record);
    return this;
  }

  fail(value: string): this {
    this.failing.add(value);
    return this;
  }

  async fetch(identifier: SubjectIdentifier): Promise<FetchResult<MetadataRecord>> {
    this.calls.push(identifier);

    if (this.failing.has(identifier.value)) {
      return { status: 'error', message: 'HTTP 503' };
    }

    const record = this.records.get(identifier.value);
    return record ? { status: 'found', record } : { status: 'not_found' };
  }
}
