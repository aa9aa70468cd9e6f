export type RunId = string & { readonly __brand: "RunId" };

export type PipelineStage =
  | "authenticate"
  | "extract"
  | "prompt"
  | "generate"
  | "parse"
  | "reference"
  | "render"
  | "write";

export type StageTiming = {
  stage: PipelineStage;
  elapsedMs: number;
};
