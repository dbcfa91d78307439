/**
 * Runs a configured shell command once per task
 */

import { spawn } from 'child_process';
import { AgentLogger } from '../../shared/src/logger.js';
import type { ExecutionContext, ExecutionResult, TaskExecutor } from '../../shared/src/agentRunner.js';
import type { TaskRecord } from '../../shared/src/types.js';

export interface CommandExecutorOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Lines of output kept for the status note */
  tailLines?: number;
}

export function taskEnvironment(task: TaskRecord, context: ExecutionContext): Record<string, string> {
  return {
    TASKMESH_TASK_ID: String(task.id),
    TASKMESH_TASK_TITLE: task.title,
    TASKMESH_TASK_DESCRIPTION: task.description,
    TASKMESH_TASK_ROLE: task.targetRole,
    TASKMESH_TASK_BRANCH: task.branch ?? '',
    TASKMESH_EXECUTION_CONTEXT: context.executionContext ?? '',
    TASKMESH_RESUMED: context.resumed ? '1' : '0',
  };
}

/**
 * The command succeeds iff it exits with status 0. Aborting the context
 * signal terminates it.
 */
export function createCommandExecutor(command: string, options: CommandExecutorOptions = {}): TaskExecutor {
  const logger = new AgentLogger('CommandExecutor');
  const tailLines = options.tailLines ?? 20;

  return (task: TaskRecord, context: ExecutionContext): Promise<ExecutionResult> =>
    new Promise((resolve) => {
      const tail: string[] = [];
      const remember = (chunk: Buffer): void => {
        for (const line of chunk.toString().split('\n')) {
          if (!line.trim()) continue;
          logger.debug(line, { taskId: task.id });
          tail.push(line);
          if (tail.length > tailLines) tail.shift();
        }
      };

      const proc = spawn(command, {
        cwd: options.cwd,
        shell: true,
        stdio: ['ignore', 'pipe', 'pipe'],
        env: { ...process.env, ...options.env, ...taskEnvironment(task, context) },
      });

      const onAbort = (): void => {
        proc.kill('SIGTERM');
      };
      context.signal.addEventListener('abort', onAbort, { once: true });

      proc.stdout.on('data', remember);
      proc.stderr.on('data', remember);

      proc.once('error', (error) => {
        context.signal.removeEventListener('abort', onAbort);
        resolve({ success: false, summary: `Failed to start command: ${error.message}` });
      });

      proc.once('close', (code, signal) => {
        context.signal.removeEventListener('abort', onAbort);
        const output = tail.join('\n');
        if (code === 0) {
          resolve({ success: true, summary: output || undefined });
          return;
        }
        const reason = signal ? `terminated by ${signal}` : `exited with status ${String(code)}`;
        resolve({ success: false, summary: output ? `${reason}\n${output}` : reason });
      });
    });
}
