import { QueueAdapter, QueueTaskSnapshot, SimulationOutput, TaskSpec } from '../types';

type InMemoryTaskState = 'PENDING' | 'STARTED' | 'SUCCESS' | 'FAILURE' | 'TIMEOUT' | 'REVOKED';

interface InMemoryTask {
  spec: TaskSpec;
  state: InMemoryTaskState;
  progress?: number;
  result?: SimulationOutput;
  error?: string;
  submittedAt: Date;
}

const FINISHED: ReadonlySet<InMemoryTaskState> = new Set(['SUCCESS', 'FAILURE', 'TIMEOUT', 'REVOKED']);

/**
 * In-process queue. Nothing runs the tasks: callers drive them through
 * `start`, `progress`, `complete`, `fail`, `timeout` and `cancel`. Transitions
 * on a finished task are ignored and return false.
 */
export class InMemoryQueueAdapter implements QueueAdapter {
  private tasks: Map<string, InMemoryTask> = new Map();
  private order: string[] = [];

  async submit(spec: TaskSpec): Promise<string> {
    const taskId = `task_${Date.now()}_${Math.random().toString(36).substring(7)}`;

    this.tasks.set(taskId, {
      spec: { ...spec, params: spec.params ? { ...spec.params } : undefined },
      state: 'PENDING',
      submittedAt: new Date(),
    });
    this.order.push(taskId);

    return taskId;
  }

  async poll(taskId: string): Promise<QueueTaskSnapshot> {
    const task = this.tasks.get(taskId);

    if (!task) {
      return { state: 'PENDING' };
    }

    const snapshot: QueueTaskSnapshot = { state: task.state, tool: task.spec.tool, script: task.spec.script };

    if (task.progress !== undefined) snapshot.progress = task.progress;
    if (task.result !== undefined) snapshot.result = { ...task.result };
    if (task.error !== undefined) snapshot.error = task.error;

    return snapshot;
  }

  async cancel(taskId: string): Promise<boolean> {
    return this.transition(taskId, 'REVOKED');
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  start(taskId: string): boolean {
    return this.transition(taskId, 'STARTED');
  }

  progress(taskId: string, progress: number): boolean {
    return this.transition(taskId, 'STARTED', task => {
      task.progress = progress;
    });
  }

  complete(taskId: string, result: SimulationOutput = { status: 'success' }): boolean {
    return this.transition(taskId, 'SUCCESS', task => {
      task.progress = 100;
      task.result = result;
    });
  }

  fail(taskId: string, error: string, result?: SimulationOutput): boolean {
    return this.transition(taskId, 'FAILURE', task => {
      task.error = error;
      task.result = result;
    });
  }

  timeout(taskId: string, error: string = 'Task exceeded its time limit'): boolean {
    return this.transition(taskId, 'TIMEOUT', task => {
      task.error = error;
    });
  }

  getSpec(taskId: string): TaskSpec | undefined {
    return this.tasks.get(taskId)?.spec;
  }

  /** Ids in submission order. */
  getTaskIds(): string[] {
    return [...this.order];
  }

  /** Ids that are still waiting to be started, oldest first. */
  getPendingTaskIds(): string[] {
    return this.order.filter(taskId => this.tasks.get(taskId)?.state === 'PENDING');
  }

  clear(): void {
    this.tasks.clear();
    this.order = [];
  }

  private transition(taskId: string, state: InMemoryTaskState, apply?: (task: InMemoryTask) => void): boolean {
    const task = this.tasks.get(taskId);

    if (!task || FINISHED.has(task.state)) {
      return false;
    }

    task.state = state;
    apply?.(task);

    return true;
  }
}
