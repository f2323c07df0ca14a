/*
Purpose: estimate what is left of a run without invoking anything.
Assumptions: done tasks predict the cost of the rest; with none done, a flat per-task guess applies.
Usage: estimateRun({ graph, state, maxParallel, prices, remainingMonthlyTokens }).
*/

import type { TokenPrices } from "./config.js";
import { getTaskState, isTerminalStatus, type RunState } from "./state.js";
import { layers, type TaskGraph } from "./task-graph.js";

export const DEFAULT_TOKENS_PER_TASK = 50_000;
// Share of estimated tokens priced as input; the rest is priced as output.
export const INPUT_TOKEN_SHARE = 0.5;

export type DryRunLayer = {
  index: number;
  tasks: number[];
  rounds: number;
};

export type DryRunEstimate = {
  tasksLeft: number[];
  layers: DryRunLayer[];
  rounds: number;
  tokensPerTask: number;
  estimatedTokens: number;
  estimatedCost: number;
  remainingMonthlyTokens: number;
  fitsBudget: boolean;
};

export function estimateRun(input: {
  graph: TaskGraph;
  state: RunState | null;
  maxParallel: number;
  prices: TokenPrices;
  remainingMonthlyTokens: number;
}): DryRunEstimate {
  const { graph, state } = input;
  const parallel = Math.max(1, input.maxParallel);
  const isLeft = (id: number): boolean => {
    const status = state ? getTaskState(state, id)?.status : undefined;
    return status === undefined || !isTerminalStatus(status);
  };

  const estimateLayers: DryRunLayer[] = [];
  for (const [index, layer] of layers(graph).entries()) {
    const tasks = layer.filter(isLeft);
    if (tasks.length === 0) continue;
    estimateLayers.push({ index, tasks, rounds: Math.ceil(tasks.length / parallel) });
  }

  const tasksLeft = estimateLayers.flatMap((layer) => layer.tasks).sort((a, b) => a - b);
  const tokensPerTask = meanDoneTokens(graph, state) ?? DEFAULT_TOKENS_PER_TASK;
  const estimatedTokens = tokensPerTask * tasksLeft.length;

  return {
    tasksLeft,
    layers: estimateLayers,
    rounds: estimateLayers.reduce((sum, layer) => sum + layer.rounds, 0),
    tokensPerTask,
    estimatedTokens,
    estimatedCost: priceTokens(estimatedTokens, input.prices),
    remainingMonthlyTokens: input.remainingMonthlyTokens,
    fitsBudget: estimatedTokens <= input.remainingMonthlyTokens,
  };
}

export function priceTokens(tokens: number, prices: TokenPrices): number {
  const inputTokens = tokens * INPUT_TOKEN_SHARE;
  const outputTokens = tokens - inputTokens;
  const cost = (inputTokens * prices.input + outputTokens * prices.output) / 1_000_000;
  return Math.round(cost * 1_000_000) / 1_000_000;
}

function meanDoneTokens(graph: TaskGraph, state: RunState | null): number | null {
  if (!state) return null;
  const done = graph.ids.flatMap((id) => {
    const task = getTaskState(state, id);
    return task?.status === "done" ? [task.tokens] : [];
  });
  if (done.length === 0) return null;

  const total = done.reduce((sum, tokens) => sum + tokens, 0);
  return Math.round(total / done.length);
}
