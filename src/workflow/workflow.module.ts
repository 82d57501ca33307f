import { Module } from "@nestjs/common";

import { WorkflowController } from "./workflow.controller";
import { RunsController } from "./runs.controller";
import { OperationCatalogController } from "./operation-catalog.controller";

import { SchemaValidationService } from "../common/schema-validation.service";
import { HttpTaskClient } from "../connectors/task-service.client";
import { RUNTIME_CONFIG, RuntimeConfig, loadRuntimeConfigFromEnv } from "../runtime/config";
import { WorkflowEngine } from "../runtime/engine";
import { RESULT_STORE } from "../runtime/store";
import { createResultStoreFromEnv } from "../runtime/store.factory";
import { RemoteTaskClient } from "../runtime/task-client";
import { createBuiltinRegistry } from "./operations/builtin";
import { OperationRegistry } from "./operations/registry";
import { ResultFileWriter } from "./result-file.writer";
import { WorkflowLoader } from "./workflow.loader";
import { WorkflowService } from "./workflow.service";
import { WorkflowValidationService } from "./workflow-validation.service";

export const TASK_CLIENT = "TaskClient";

@Module({
  controllers: [WorkflowController, RunsController, OperationCatalogController],
  providers: [
    { provide: RUNTIME_CONFIG, useFactory: () => loadRuntimeConfigFromEnv() },
    {
      provide: TASK_CLIENT,
      useFactory: (cfg: RuntimeConfig) => new HttpTaskClient(cfg.taskService),
      inject: [RUNTIME_CONFIG],
    },
    { provide: RESULT_STORE, useFactory: () => createResultStoreFromEnv() },
    { provide: OperationRegistry, useFactory: () => createBuiltinRegistry() },
    {
      provide: WorkflowEngine,
      useFactory: (client: RemoteTaskClient, registry: OperationRegistry, cfg: RuntimeConfig) =>
        new WorkflowEngine(client, registry, { statusRetry: cfg.polling.statusRetry }),
      inject: [TASK_CLIENT, OperationRegistry, RUNTIME_CONFIG],
    },

    SchemaValidationService,
    WorkflowLoader,
    WorkflowValidationService,
    ResultFileWriter,
    WorkflowService,
  ],
  exports: [WorkflowService, WorkflowLoader, ResultFileWriter, RUNTIME_CONFIG],
})
export class WorkflowModule {}
