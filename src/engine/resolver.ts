/**
 * Target expansion: workflow names to codes, and optionally the dependency
 * closure of the requested codes.
 */

import { InvalidTargetError } from "./errors.js";
import type { EngineRegistry } from "./registry.js";

export type TargetRequest = string | number;

const CODE_TOKEN = /^\s*[+-]?\d+\s*$/;

function toCode(request: TargetRequest): number {
  if (typeof request === "number") {
    if (!Number.isSafeInteger(request)) throw new InvalidTargetError(String(request));
    return request;
  }
  if (!CODE_TOKEN.test(request)) throw new InvalidTargetError(request);
  return Number.parseInt(request, 10);
}

/**
 * Resolve workflow names and optionally add upstream targets.
 *
 * Without dependencies the result keeps the request order and any repeats;
 * the engine runs a repeated task once anyway. With dependencies the result
 * is the closure as a set, sorted ascending.
 */
export function expandTargets(
  registry: EngineRegistry,
  requests: readonly TargetRequest[],
  includeDependencies = false,
): number[] {
  const seeds: number[] = [];
  for (const request of requests) {
    const workflow = typeof request === "string" ? registry.findWorkflow(request) : undefined;
    if (workflow) {
      seeds.push(...workflow);
    } else {
      seeds.push(toCode(request));
    }
  }

  if (!includeDependencies) return seeds;
  return addDependencies(registry, seeds);
}

/**
 * Depth-first closure over a work stack: the last pending code is taken next
 * and newly found inputs go to the front. Requested codes must have a producing
 * task; an input nobody produces is an external file and stays out of the plan.
 */
function addDependencies(registry: EngineRegistry, seeds: number[]): number[] {
  const pending = [...seeds];
  const closure = new Set<number>();

  while (pending.length > 0) {
    const code = pending.pop();
    if (code === undefined) break;
    closure.add(code);
    const task = registry.getTask(code);

    for (const input of task.inputCodes) {
      if (closure.has(input) || pending.includes(input)) continue;
      if (!registry.hasTask(input)) continue;
      pending.unshift(input);
    }
  }

  return [...closure].sort((a, b) => a - b);
}
