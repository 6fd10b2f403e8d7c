import type { ExternalSkill, SearchOptions, SearchResult, SourceType } from '@skillforge/ipc';
import { emptySearchResult } from '@skillforge/ipc';
import type { Source } from '../types';
import { HttpSourceClient } from './http-client';
import type { HttpSourceClientOptions } from './http-client';

export interface RemoteSourceOptions {
  /** Override the provider's API root (tests, self-hosted instances) */
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * Common ground for the code-hosting adapters: an enable flag, a configured
 * HTTP client, and content resolution through `getSkill`.
 */
export abstract class RemoteSource implements Source {
  abstract readonly name: SourceType;
  protected readonly http: HttpSourceClient;
  private enabled = true;

  protected constructor(clientOptions: HttpSourceClientOptions) {
    this.http = new HttpSourceClient(clientOptions);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  abstract search(options: SearchOptions, signal?: AbortSignal): Promise<SearchResult>;
  abstract getSkill(id: string, signal?: AbortSignal): Promise<ExternalSkill | null>;

  async getContent(skill: ExternalSkill, signal?: AbortSignal): Promise<string> {
    if (skill.content) return skill.content;
    const full = await this.getSkill(skill.id, signal);
    return full?.content ?? '';
  }

  protected empty(options: SearchOptions): SearchResult {
    return emptySearchResult(this.name, options);
  }
}
