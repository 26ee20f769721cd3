export interface StepOptionsInterface {
  dryRun: boolean;
  signal?: AbortSignal;
}
