import { StoreAuditLogger } from "./audit/audit_logger";
import { resolveDbPath, resolvePipelineConfig, type Env, type PipelineConfig } from "./config/pipeline_config";
import type { PipelineLogger } from "./log";
import { CaseOrchestrator } from "./pipeline/orchestrator";
import type { StageGraph } from "./pipeline/stage_graph";
import { resolveModelProvider, type ModelSelection } from "./providers/provider_config";
import type { ProgressEmitter } from "./sse/progress_hub";
import { SqliteCaseStore } from "./store/sqlite_case_store";
import { buildDefaultPipeline, createTaskModel } from "./tasks/registry";
import { SchoolReference } from "./tasks/school_reference";

export type Runtime = {
  dbPath: string;
  store: SqliteCaseStore;
  graph: StageGraph;
  config: PipelineConfig;
  model: ModelSelection;
  orchestrator: CaseOrchestrator;
};

/** Wires the store, the default pipeline and the orchestrator from the environment. */
export function createRuntime(args: { env?: Env; log: PipelineLogger; progress?: ProgressEmitter }): Runtime {
  const env = args.env ?? process.env;
  const dbPath = resolveDbPath(env);
  const config = resolvePipelineConfig(env);
  const model = resolveModelProvider(env);

  const store = new SqliteCaseStore(dbPath, args.log);
  const schools = SchoolReference.load(env.SCHOOL_REFERENCE_PATH || undefined);
  const graph = buildDefaultPipeline({ model: createTaskModel(model, args.log), schools, log: args.log });
  const orchestrator = new CaseOrchestrator({
    store,
    graph,
    audit: new StoreAuditLogger(store, args.log),
    progress: args.progress,
    config,
    log: args.log,
  });
  return { dbPath, store, graph, config, model, orchestrator };
}
