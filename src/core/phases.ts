/*
Purpose: the phase enum and the legal phase-to-phase edges of a running task.
Assumptions: phases are persisted verbatim in run-state.json, so renaming one is a format change.
Usage: assertPhaseTransition(taskId, "test", "fix");
*/

import { z } from "zod";

import { InvalidTransitionError } from "./errors.js";

// =============================================================================
// PHASES
// =============================================================================

export const PHASES = [
  "build",
  "deps",
  "test",
  "coverage",
  "fix",
  "static",
  "static_fix",
  "review",
  "document",
  "commit",
  "notify",
  "deploy",
] as const;

export const PhaseSchema = z.enum(PHASES);
export type Phase = z.infer<typeof PhaseSchema>;

export const PHASE_TRANSITIONS: Readonly<Record<Phase, readonly Phase[]>> = {
  build: ["deps", "fix"],
  deps: ["test"],
  test: ["coverage", "static", "fix"],
  coverage: ["static", "fix"],
  fix: ["deps"],
  static: ["static_fix", "review", "document"],
  static_fix: ["static"],
  review: ["document", "fix", "commit"],
  document: ["commit"],
  commit: ["notify"],
  notify: ["deploy"],
  deploy: [],
};

// Phases a run may enter a task at. Milestones start at review; everything else at build.
export const ENTRY_PHASES: readonly Phase[] = ["build", "review"];

// Phases that call the coding agent and therefore spend tokens.
export const AGENT_PHASES = ["build", "fix", "static_fix", "review", "document"] as const satisfies readonly Phase[];

export type AgentPhase = (typeof AGENT_PHASES)[number];

// =============================================================================
// CHECKS
// =============================================================================

export function canTransitionPhase(from: Phase, to: Phase): boolean {
  return PHASE_TRANSITIONS[from].includes(to);
}

export function assertPhaseTransition(taskId: number, from: Phase, to: Phase): void {
  if (!canTransitionPhase(from, to)) {
    throw new InvalidTransitionError(taskId, `running:${from}`, `running:${to}`);
  }
}

export function isAgentPhase(phase: Phase): phase is AgentPhase {
  return AGENT_PHASES.some((agentPhase) => agentPhase === phase);
}
