import type { OrchestrationContext } from '../core/orchestration-context';
import { SubmittedTask, TaskStatus } from './task.types';

export interface OrchestrationPlugin {
  name: string;

  onInit?(context: OrchestrationContext): Promise<void> | void;

  onTaskSubmitted?(task: SubmittedTask): Promise<void> | void;

  /** Called once per task, the first time a terminal state is observed. */
  onTaskSettled?(status: TaskStatus): Promise<void> | void;

  onDispose?(): Promise<void> | void;
}
