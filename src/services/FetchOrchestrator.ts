import {
  AggregateResult,
  AggregateStatus,
  FetchedDocument,
  OrchestratorTask,
  TaskOutcome
} from '../types/index.js';
import { isProxyError } from '../utils/errors.js';
import { Logger, getErrorMessage, maskUrl } from '../utils/logger.js';
import { clampTimeout } from '../utils/timeouts.js';
import { ConnectionGovernor, hostOf } from './ConnectionGovernor.js';
import { DocumentFetcher } from './ManifestFetcher.js';

export function jsonTask(id: string, url: string, headers?: Record<string, string>): OrchestratorTask<unknown> {
  return {
    id,
    url,
    kind: 'metadata',
    headers,
    parse: (document: FetchedDocument): unknown => JSON.parse(document.body.toString('utf8'))
  };
}

export function textTask(id: string, url: string, headers?: Record<string, string>): OrchestratorTask<string> {
  return {
    id,
    url,
    kind: 'subtitle',
    headers,
    parse: (document: FetchedDocument) => document.body.toString('utf8')
  };
}

function aggregateStatus(outcomes: TaskOutcome[]): AggregateStatus {
  const fulfilled = outcomes.filter(outcome => outcome.status === 'fulfilled').length;
  if (fulfilled === outcomes.length) return 'complete';
  if (fulfilled === 0) return 'failed';
  return 'partial';
}

/**
 * Scatter/gather over upstream documents.
 *
 * Every task goes through the same governor as the proxy, so metadata loading and playback
 * share one per-host connection budget. Results that arrive after the deadline are abandoned:
 * the aggregate is final once returned, and the requests of timed-out tasks are aborted so their
 * slots are freed.
 */
export class FetchOrchestrator {
  private readonly logger: Logger;

  constructor(
    private readonly governor: ConnectionGovernor,
    private readonly fetcher: DocumentFetcher,
    private readonly defaultDeadline: number
  ) {
    this.logger = new Logger('FetchOrchestrator');
  }

  async gather<T = unknown>(tasks: OrchestratorTask<T>[], deadlineMs: number = this.defaultDeadline): Promise<AggregateResult<T>> {
    const startedAt = Date.now();
    const ids = new Set<string>();
    for (const task of tasks) {
      if (ids.has(task.id)) {
        throw new Error(`Duplicate orchestrator task id: ${task.id}`);
      }
      ids.add(task.id);
    }

    const settled = new Map<string, TaskOutcome<T>>();
    const controllers = new Map<string, AbortController>();
    let closed = false;

    const runs = tasks.map(task => {
      const controller = new AbortController();
      controllers.set(task.id, controller);

      return this.runTask(task, controller.signal).then(outcome => {
        if (closed) {
          this.logger.debug('Discarding result that arrived after the deadline', {
            taskId: task.id,
            status: outcome.status
          });
          return;
        }
        settled.set(task.id, outcome);
      });
    });

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<void>(resolve => {
      timer = setTimeout(resolve, clampTimeout(deadlineMs));
    });

    await Promise.race([Promise.all(runs), deadline]);
    clearTimeout(timer);
    closed = true;

    const outcomes: Record<string, TaskOutcome<T>> = {};
    for (const task of tasks) {
      const outcome = settled.get(task.id);
      if (outcome) {
        outcomes[task.id] = outcome;
      } else {
        outcomes[task.id] = { status: 'timedOut' };
        controllers.get(task.id)?.abort();
      }
    }

    const result: AggregateResult<T> = {
      status: aggregateStatus(Object.values(outcomes)),
      outcomes,
      durationMs: Date.now() - startedAt
    };

    const counts = Object.values(outcomes).reduce<Record<string, number>>((acc, outcome) => {
      acc[outcome.status] = (acc[outcome.status] ?? 0) + 1;
      return acc;
    }, {});

    if (result.status === 'failed' && tasks.length > 0) {
      this.logger.warn('Every orchestrator task failed', { tasks: tasks.length, ...counts });
    } else {
      this.logger.info('Gather finished', { status: result.status, durationMs: result.durationMs, ...counts });
    }

    return result;
  }

  /** Never rejects; every failure becomes a failed outcome. */
  private async runTask<T>(task: OrchestratorTask<T>, signal: AbortSignal): Promise<TaskOutcome<T>> {
    const startedAt = Date.now();

    try {
      const document = await this.governor.withSlot(
        hostOf(task.url),
        () => this.fetcher.fetch(task.url, { headers: task.headers, signal }),
        { signal }
      );

      return { status: 'fulfilled', value: task.parse(document), durationMs: Date.now() - startedAt };
    } catch (error) {
      if (!signal.aborted) {
        this.logger.warn('Orchestrator task failed', {
          taskId: task.id,
          url: maskUrl(task.url),
          error: getErrorMessage(error)
        });
      }
      return {
        status: 'failed',
        code: isProxyError(error) ? error.code : 'TASK_FAILED',
        message: getErrorMessage(error),
        durationMs: Date.now() - startedAt
      };
    }
  }
}
