export * as ChangeSet from "./change_set";
export * as CommitPlan from "./commit_plan";
export * as Commit from "./commit";
export * as Git from "./git";
export * as GitHub from "./github";
export * as Logger from "./logger";
export * as Payload from "./payload";

// Entry point
export { commitStagedChanges } from "./commit";
export type { CommitOutcome, CommitStagedChangesOptions } from "./commit";
export type { CommitStrategy } from "./payload";
