import axios from 'axios';
import type { Logger } from '../logger';
import { nodeResultSchema } from '../schemas';
import type { Language, NodeResult } from '../types';
import type { LanguageNode, NodeRequest } from './node';

/**
 * Language node running as a separate service. The remote side receives the
 * already-detected request and answers with a `NodeResult` as JSON.
 */
export class HttpLanguageNode implements LanguageNode {
  readonly kind = 'http' as const;
  private readonly endpoint: string;

  constructor(
    readonly id: string,
    readonly language: Language,
    baseUrl: string,
    private readonly timeoutMs: number,
    private readonly logger: Logger
  ) {
    if (!baseUrl) throw new Error(`An endpoint URL is required for node ${id}`);
    this.endpoint = `${baseUrl.replace(/\/$/, '')}/process`;
  }

  async process(request: NodeRequest, signal: AbortSignal): Promise<NodeResult> {
    try {
      const response = await axios.post<unknown>(this.endpoint, request, {
        headers: { 'Content-Type': 'application/json' },
        timeout: this.timeoutMs,
        signal,
      });

      const parsed = nodeResultSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new Error(`Invalid response from ${this.id}: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`);
      }
      return parsed.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        this.logger.warn(
          {
            nodeId: this.id,
            status: error.response?.status,
            statusText: error.response?.statusText,
            code: error.code,
          },
          'Language node HTTP error'
        );
      }
      throw error;
    }
  }
}
