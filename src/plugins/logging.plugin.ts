import { LoggerAdapter, OrchestrationPlugin, SubmittedTask, TaskState, TaskStatus } from '../types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggingPluginConfig {
  logger: LoggerAdapter;
  logLevel?: LogLevel;
  /** Attach the task or status payload to each line. */
  includeStatus?: boolean;
}

export class LoggingPlugin implements OrchestrationPlugin {
  name = 'LoggingPlugin';

  constructor(private readonly config: LoggingPluginConfig) {}

  onInit(): void {
    if (this.shouldLog('info')) {
      this.config.logger.log(`[${this.name}] Plugin initialized`);
    }
  }

  onTaskSubmitted(task: SubmittedTask): void {
    if (this.shouldLog('debug')) {
      this.config.logger.debug(
        `Task ${task.taskId} submitted: ${task.spec.tool}/${task.spec.script}`,
        this.config.includeStatus ? task : undefined
      );
    }
  }

  onTaskSettled(status: TaskStatus): void {
    const payload = this.config.includeStatus ? status : undefined;

    if (status.state === TaskState.SUCCESS) {
      if (this.shouldLog('info')) {
        this.config.logger.log(`Task ${status.taskId} succeeded`, payload);
      }
      return;
    }

    if (status.state === TaskState.CANCELLED) {
      if (this.shouldLog('warn')) {
        this.config.logger.warn(`Task ${status.taskId} was cancelled`, payload);
      }
      return;
    }

    if (this.shouldLog('error')) {
      this.config.logger.error(
        `Task ${status.taskId} ended in state ${status.state}`,
        status.error ? new Error(status.error) : undefined,
        payload
      );
    }
  }

  onDispose(): void {
    if (this.shouldLog('info')) {
      this.config.logger.log(`[${this.name}] Plugin disposed`);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    const levels: LogLevel[] = ['debug', 'info', 'warn', 'error'];
    const configLevel = this.config.logLevel || 'info';

    return levels.indexOf(level) >= levels.indexOf(configLevel);
  }
}
