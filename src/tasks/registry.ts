import type { PipelineLogger } from "../log";
import { buildStageGraph, type StageGraph } from "../pipeline/stage_graph";
import type { CheckpointDefinition, TaskDefinition } from "../pipeline/task";
import { FakeTaskModel } from "../providers/fake_model";
import { OpenAITaskModel } from "../providers/openai_model";
import type { ModelSelection } from "../providers/provider_config";
import type { TaskModel } from "../providers/task_model";
import { applicationReaderTask } from "./application_reader";
import { documentExtractionTask } from "./document_extraction";
import { evaluationReportTask } from "./evaluation_report";
import { gradeReaderTask } from "./grade_reader";
import { recommendationReaderTask } from "./recommendation_reader";
import { SCHOOL_CONTEXT, schoolContextTask } from "./school_context";
import { SCHOOL_ENRICHMENT, schoolEnrichmentTask } from "./school_enrichment";
import { studentEvaluatorTask } from "./student_evaluator";
import type { TaskDeps } from "./task_support";

export const DEFAULT_CHECKPOINTS: readonly CheckpointDefinition[] = [
  { name: "school_context_check", producer: SCHOOL_ENRICHMENT, validator: SCHOOL_CONTEXT },
];

export function createDefaultTasks(deps: TaskDeps): TaskDefinition[] {
  return [
    documentExtractionTask(),
    applicationReaderTask(deps),
    gradeReaderTask(deps),
    recommendationReaderTask(deps),
    schoolEnrichmentTask(deps),
    schoolContextTask(deps.schools),
    studentEvaluatorTask(deps),
    evaluationReportTask(),
  ];
}

export function buildDefaultPipeline(deps: TaskDeps): StageGraph {
  return buildStageGraph({ tasks: createDefaultTasks(deps), checkpoints: DEFAULT_CHECKPOINTS });
}

export function createTaskModel(selection: ModelSelection, log?: PipelineLogger): TaskModel {
  if (selection.provider === "openai") {
    return new OpenAITaskModel({
      apiKey: selection.apiKey,
      model: selection.model,
      baseUrl: selection.baseUrl,
      log,
    });
  }
  return new FakeTaskModel();
}
