/**
 * Board workflow classification from issue labels.
 *
 * Label matching is case-insensitive and exact. When an open issue carries
 * labels from several states, the state that comes first in the configured
 * order wins; the order of labels on the issue never matters.
 */

import type { WorkflowConfig, WorkflowState } from "./config.js";

export interface ClassifiableIssue {
  state: string;
  labels: readonly string[];
}

export class WorkflowClassifier {
  private readonly order: ReadonlyArray<{ state: WorkflowState; labels: ReadonlySet<string> }>;
  private readonly allowOpenAsDone: boolean;

  constructor(config: WorkflowConfig) {
    this.order = config.states.map((entry) => ({
      state: entry.state,
      labels: new Set(entry.labels.map((label) => label.toLowerCase())),
    }));
    this.allowOpenAsDone = config.allowOpenAsDone;
  }

  classify(issue: ClassifiableIssue): WorkflowState {
    if (issue.state === "closed") return "done";

    const labels = new Set(issue.labels.map((label) => label.toLowerCase()));
    for (const { state, labels: stateLabels } of this.order) {
      if (state === "done" && !this.allowOpenAsDone) continue;
      for (const label of labels) {
        if (stateLabels.has(label)) return state;
      }
    }
    return "to_do";
  }

  /** Count issues per state; every state is present, zero or not. */
  tally(issues: readonly ClassifiableIssue[]): Record<WorkflowState, number> {
    const counts: Record<WorkflowState, number> = {
      to_do: 0,
      in_progress: 0,
      in_review: 0,
      blocked: 0,
      done: 0,
    };
    for (const issue of issues) counts[this.classify(issue)]++;
    return counts;
  }
}
