export {
  JobGuard,
  type JobKind,
  type GuardedJob,
  type GuardStatus,
  type GuardSnapshot,
} from "./job-guard.js";
