// HTTP client for the command-center gateway's REST API

import type { IRemoteClient, ISendMessageOptions } from '../core/interfaces/remote-client.js';
import type { IAgent, IMessage, IProject, IStatusSnapshot } from '../core/interfaces/entities.js';
import {
  parseAgentList,
  parseMessageList,
  parseProjectList,
  parseStatusSnapshot,
} from '../core/parsers/entities.js';
import { isRecord } from '../core/parsers/common.js';
import {
  decodeError,
  describeError,
  httpStatusError,
  networkError,
  timeoutError,
} from '../core/errors/sync-error.js';
import { DEFAULT_MESSAGE_LIMIT, DEFAULT_REQUEST_TIMEOUT_MS } from '../config/defaults.js';

export interface IHttpRemoteClientConfig {
  baseUrl: string;
  timeoutMs?: number;
  messageLimit?: number;
  fetch?: typeof fetch;
}

export class HttpRemoteClient implements IRemoteClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly messageLimit: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: IHttpRemoteClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.messageLimit = config.messageLimit ?? DEFAULT_MESSAGE_LIMIT;
    this.fetchImpl = config.fetch ?? fetch;
  }

  get url(): string {
    return this.baseUrl;
  }

  // Resolves true on a 2xx answer; failures reject so the caller sees the reason
  async healthCheck(): Promise<boolean> {
    await this.request('/health');
    return true;
  }

  async listProjects(): Promise<IProject[]> {
    return parseProjectList(await this.request('/api/projects'));
  }

  async listAgents(projectId: string): Promise<IAgent[]> {
    return parseAgentList(
      await this.request(`/api/projects/${encodeURIComponent(projectId)}/agents`)
    );
  }

  async listMessages(agentId: string): Promise<IMessage[]> {
    return parseMessageList(
      await this.request(`/api/agents/${encodeURIComponent(agentId)}/messages?limit=${this.messageLimit}`)
    );
  }

  async sendMessage(
    agentId: string,
    projectId: string,
    text: string,
    options?: ISendMessageOptions
  ): Promise<void> {
    const body: Record<string, string> = { message: text, projectId };
    if (options?.clientMessageId) {
      body.id = options.clientMessageId;
    }
    await this.request(`/api/agents/${encodeURIComponent(agentId)}/send`, {
      method: 'POST',
      body: JSON.stringify(body),
    });
  }

  async getStatus(): Promise<IStatusSnapshot> {
    return parseStatusSnapshot(await this.request('/api/status'));
  }

  private async request(path: string, init?: { method?: string; body?: string }): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    // The timeout covers the body as well as the headers
    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: init?.method ?? 'GET',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        body: init?.body,
        signal: controller.signal,
      });
      text = await readBody(response, controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        throw timeoutError(path, this.timeoutMs);
      }
      throw networkError(`Gateway unreachable: ${describeError(error)}`, { path });
    } finally {
      clearTimeout(timeoutId);
    }

    let body: unknown = null;
    if (text.length > 0) {
      try {
        body = JSON.parse(text);
      } catch {
        if (response.ok) {
          throw decodeError(`Gateway returned invalid JSON for ${path}`, { path });
        }
      }
    }

    if (!response.ok) {
      const reason = isRecord(body) && typeof body.error === 'string'
        ? body.error
        : response.statusText || 'Request failed';
      throw httpStatusError(response.status, reason, path);
    }

    return body;
  }
}

// A body stream that stalls would otherwise outlive the abort
function readBody(response: Response, signal: AbortSignal): Promise<string> {
  if (signal.aborted) {
    return Promise.reject(new Error('Request aborted'));
  }
  const aborted = new Promise<never>((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(new Error('Request aborted')), { once: true });
  });
  return Promise.race([response.text(), aborted]);
}
