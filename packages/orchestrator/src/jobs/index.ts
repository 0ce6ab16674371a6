export { BackgroundJobRunner } from "./job-runner.js";
export type { EventSink, JobExecution, JobHandle, JobOutcome, JobResult, JobWork } from "./job-runner.js";
