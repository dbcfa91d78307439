/**
 * HTTP client for the coordination API.
 *
 * Implements the same CoordinatorOperations interface as the in-process
 * Coordinator, and turns `{ error: { code, ... } }` responses back into the
 * typed errors, so callers cannot tell the two apart.
 */

import axios, { AxiosError, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { CoordinationError, StoreUnavailableError, errorFromPayload } from './errors.js';
import type {
  AgentRecord,
  CoordinatorOperations,
  CreateTaskInput,
  ForceReleaseOptions,
  LockToken,
  NextTaskQuery,
  NextTaskResult,
  RegisterAgentInput,
  TaskChange,
  TaskListQuery,
  TaskRecord,
  TaskStatus,
} from './types.js';

export interface CoordinatorClientOptions {
  baseUrl: string;
  apiKey: string;
  adminKey?: string | undefined;
  /** Timeout for ordinary requests; long-polls add their wait on top */
  timeoutMs?: number;
}

export class CoordinatorClient implements CoordinatorOperations {
  private http: AxiosInstance;
  private adminKey: string | undefined;
  private timeoutMs: number;

  constructor(options: CoordinatorClientOptions) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.adminKey = options.adminKey;
    this.http = axios.create({
      baseURL: `${options.baseUrl.replace(/\/+$/, '')}/api/v1`,
      timeout: this.timeoutMs,
      headers: { 'X-API-Key': options.apiKey },
    });
  }

  private async request<T>(config: AxiosRequestConfig): Promise<T> {
    try {
      const response = await this.http.request<{ data: T }>(config);
      return response.data.data;
    } catch (error) {
      throw toCoordinationError(error, `${config.method ?? 'get'} ${config.url ?? ''}`);
    }
  }

  register(input: RegisterAgentInput): Promise<AgentRecord> {
    return this.request({ method: 'post', url: '/register', data: input });
  }

  heartbeat(agentId: string): Promise<AgentRecord> {
    return this.request({ method: 'post', url: `/agents/${encodeURIComponent(agentId)}/heartbeat` });
  }

  listAgents(): Promise<AgentRecord[]> {
    return this.request({ method: 'get', url: '/agents' });
  }

  createTask(input: CreateTaskInput): Promise<TaskRecord> {
    return this.request({ method: 'post', url: '/tasks', data: input });
  }

  getTask(taskId: number): Promise<TaskRecord> {
    return this.request({ method: 'get', url: `/tasks/${taskId}` });
  }

  listTasks(query: TaskListQuery = {}): Promise<TaskRecord[]> {
    return this.request({ method: 'get', url: '/tasks', params: query });
  }

  promote(taskId: number, agentId: string): Promise<TaskRecord> {
    return this.request({ method: 'post', url: `/tasks/${taskId}/promote`, data: { agentId } });
  }

  async nextTask(query: NextTaskQuery): Promise<NextTaskResult> {
    const { signal, ...params } = query;
    if (signal?.aborted) {
      return { outcome: 'cancelled' };
    }
    try {
      return await this.request<NextTaskResult>({
        method: 'get',
        url: '/tasks/next',
        params,
        signal,
        timeout: this.timeoutMs + (params.waitMs ?? 0),
      });
    } catch (error) {
      if (signal?.aborted) {
        return { outcome: 'cancelled' };
      }
      throw error;
    }
  }

  lock(taskId: number, agentId: string, executionContext: string | null = null): Promise<LockToken> {
    return this.request({ method: 'post', url: `/tasks/${taskId}/lock`, data: { agentId, executionContext } });
  }

  setStatus(taskId: number, agentId: string, status: TaskStatus, notes?: string): Promise<TaskRecord> {
    return this.request({ method: 'put', url: `/tasks/${taskId}/status`, data: { agentId, status, notes } });
  }

  forceRelease(taskId: number, options: ForceReleaseOptions = {}): Promise<TaskRecord> {
    return this.request({
      method: 'post',
      url: `/admin/tasks/${taskId}/force-release`,
      data: options,
      headers: this.adminHeaders(),
    });
  }

  listStaleLocks(): Promise<TaskRecord[]> {
    return this.request({ method: 'get', url: '/admin/locks/stale', headers: this.adminHeaders() });
  }

  taskHistory(taskId: number): Promise<TaskChange[]> {
    return this.request({ method: 'get', url: `/tasks/${taskId}/history` });
  }

  changesSince(since?: string): Promise<TaskChange[]> {
    return this.request({ method: 'get', url: '/changes', params: since === undefined ? {} : { since } });
  }

  private adminHeaders(): Record<string, string> {
    return this.adminKey ? { 'X-Admin-Key': this.adminKey } : {};
  }
}

function isErrorPayload(value: unknown): value is { error: { code?: unknown; message?: unknown; context?: unknown } } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'error' in value &&
    typeof value.error === 'object' &&
    value.error !== null
  );
}

/**
 * Responses carrying an error payload become typed errors. A missing or
 * unreachable server is reported as StoreUnavailable so callers retry it the
 * same way as a store outage.
 */
export function toCoordinationError(error: unknown, operation: string): Error {
  if (error instanceof CoordinationError) {
    return error;
  }
  if (error instanceof AxiosError) {
    const response = error.response;
    if (response && isErrorPayload(response.data)) {
      return errorFromPayload(response.data.error, response.status);
    }
    if (!response || response.status >= 502) {
      return new StoreUnavailableError(operation, { reason: error.code ?? 'no response' }, error);
    }
    return new CoordinationError('INTERNAL', error.message, response.status, { operation });
  }
  return error instanceof Error ? error : new Error(String(error));
}
