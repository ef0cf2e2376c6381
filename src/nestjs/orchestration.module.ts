import 'reflect-metadata';
import {
  DynamicModule,
  Inject,
  Module,
  OnApplicationBootstrap,
  OnModuleDestroy,
  Provider,
  Type,
} from '@nestjs/common';
import { RedisQueueAdapter } from '../adapters/redis-queue.adapter';
import { OrchestrationConfigInput } from '../config/orchestration.config';
import { OrchestrationContext } from '../core/orchestration-context';
import { TaskClient } from '../core/task-client';
import { WorkflowAggregator } from '../core/workflow-aggregator';
import { WorkflowRouter } from '../core/workflow-router';
import { LoggerAdapter, OrchestrationPlugin, QueueAdapter } from '../types';

export interface OrchestrationModuleOptions {
  /**
   * An adapter instance, or a class the container instantiates. Without one,
   * a Redis queue is built from `config.queue`.
   */
  queue?: QueueAdapter | Type<QueueAdapter>;
  config?: OrchestrationConfigInput;
  plugins?: OrchestrationPlugin[];
  logger?: LoggerAdapter;
  /** Defaults to true. */
  isGlobal?: boolean;
}

export const ORCHESTRATION_CONTEXT = Symbol('ORCHESTRATION_CONTEXT');
export const QUEUE_ADAPTER = Symbol('QUEUE_ADAPTER');

function queueProvider(queue?: QueueAdapter | Type<QueueAdapter>): Provider {
  if (queue === undefined) {
    return {
      provide: QUEUE_ADAPTER,
      useFactory: (context: OrchestrationContext) => RedisQueueAdapter.fromConfig(context.config.queue),
      inject: [ORCHESTRATION_CONTEXT],
    };
  }

  if (typeof queue === 'function') {
    return { provide: QUEUE_ADAPTER, useClass: queue };
  }

  return { provide: QUEUE_ADAPTER, useValue: queue };
}

@Module({})
export class OrchestrationModule implements OnApplicationBootstrap, OnModuleDestroy {
  constructor(
    @Inject(ORCHESTRATION_CONTEXT) private readonly context: OrchestrationContext,
    @Inject(QUEUE_ADAPTER) private readonly queue: QueueAdapter
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.context.init();
  }

  async onModuleDestroy(): Promise<void> {
    await this.context.dispose();
    await this.queue.close?.();
  }

  static forRoot(options: OrchestrationModuleOptions): DynamicModule {
    const providers: Provider[] = [
      {
        provide: ORCHESTRATION_CONTEXT,
        useFactory: () =>
          new OrchestrationContext({ config: options.config, logger: options.logger, plugins: options.plugins }),
      },
      queueProvider(options.queue),
      {
        provide: TaskClient,
        useFactory: (queue: QueueAdapter, context: OrchestrationContext) => new TaskClient(queue, context),
        inject: [QUEUE_ADAPTER, ORCHESTRATION_CONTEXT],
      },
      {
        provide: WorkflowAggregator,
        useFactory: (client: TaskClient, context: OrchestrationContext) => new WorkflowAggregator(client, context),
        inject: [TaskClient, ORCHESTRATION_CONTEXT],
      },
      {
        provide: WorkflowRouter,
        useFactory: (context: OrchestrationContext) =>
          new WorkflowRouter({ ...context.config.router, logger: context.logger }),
        inject: [ORCHESTRATION_CONTEXT],
      },
    ];

    return {
      module: OrchestrationModule,
      global: options.isGlobal !== false,
      providers,
      exports: [ORCHESTRATION_CONTEXT, QUEUE_ADAPTER, TaskClient, WorkflowAggregator, WorkflowRouter],
    };
  }
}
