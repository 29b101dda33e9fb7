/**
 * Engine Registry Tests
 *
 * Covers the registration invariants: unique spec codes, exclusive task
 * outputs, input codes below output codes, declared codes backed by specs,
 * unique workflow names.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { EngineRegistry } from "../src/engine/registry.js";
import {
  CodeOrderingError,
  DuplicateSpecError,
  DuplicateTaskOutputError,
  DuplicateWorkflowError,
  UnknownSpecError,
  UnknownTaskError,
} from "../src/engine/errors.js";
import { genericSpec, MockTask } from "./helpers/workspace.js";

let registry: EngineRegistry;

beforeEach(() => {
  registry = new EngineRegistry();
  for (let code = 1000; code < 9000; code += 100) {
    registry.registerFileSpec(genericSpec(code));
  }
  registry.registerTask(new MockTask("A", [], [1000, 1100]));
  registry.registerTask(new MockTask("D", [1000, 2000], [4000]));
});

describe("registerFileSpec", () => {
  it("rejects a second spec with the same code", () => {
    expect(() => registry.registerFileSpec(genericSpec(2000, "bar", "xlsx"))).toThrow(DuplicateSpecError);
  });

  it("stores specs by code", () => {
    expect(registry.getSpec(2000).name).toBe("foo");
    expect(registry.listSpecs()).toHaveLength(80);
  });

  it("fails lookups of unknown codes", () => {
    expect(() => registry.getSpec(9999)).toThrow(UnknownSpecError);
  });
});

describe("registerTask", () => {
  it("rejects a task claiming an output that is already produced", () => {
    expect(() => registry.registerTask(new MockTask("Z", [], [4000]))).toThrow(DuplicateTaskOutputError);
  });

  it("rejects a task whose highest input is not below its lowest output", () => {
    expect(() => registry.registerTask(new MockTask("Z", [1000, 2000, 4000], [3000, 5000]))).toThrow(
      CodeOrderingError,
    );
  });

  it("rejects equal input and output codes", () => {
    expect(() => registry.registerTask(new MockTask("Z", [3000], [3000]))).toThrow(CodeOrderingError);
  });

  it("reports the offending codes in the ordering error", () => {
    try {
      registry.registerTask(new MockTask("Z", [1000, 4000], [3000, 5000]));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CodeOrderingError);
      if (err instanceof CodeOrderingError) {
        expect(err.maxInputCode).toBe(4000);
        expect(err.minOutputCode).toBe(3000);
      }
    }
  });

  it("rejects input or output codes without a spec", () => {
    expect(() => registry.registerTask(new MockTask("Z", [1050], [3000]))).toThrow(UnknownSpecError);
    expect(() => registry.registerTask(new MockTask("Z", [1000], [9950]))).toThrow(UnknownSpecError);
  });

  it("checks output exclusivity before ordering", () => {
    expect(() => registry.registerTask(new MockTask("Z", [5000], [4000]))).toThrow(DuplicateTaskOutputError);
  });

  it("allows tasks with only inputs or only outputs", () => {
    registry.registerTask(new MockTask("sink", [8000], []));
    registry.registerTask(new MockTask("source", [], [5000]));
    expect(registry.getTask(5000).name).toBe("source");
  });

  it("maps every output code to the same task instance", () => {
    expect(registry.getTask(1000)).toBe(registry.getTask(1100));
  });

  it("leaves the registry untouched when registration fails", () => {
    expect(() => registry.registerTask(new MockTask("Z", [], [3000, 4000]))).toThrow(DuplicateTaskOutputError);
    expect(registry.hasTask(3000)).toBe(false);
  });

  it("fails lookups of codes without a producing task", () => {
    expect(() => registry.getTask(2000)).toThrow(UnknownTaskError);
  });
});

describe("registerWorkflow", () => {
  it("rejects a second workflow with the same name", () => {
    registry.registerWorkflow("daily", [4000]);
    expect(() => registry.registerWorkflow("daily", [1000])).toThrow(DuplicateWorkflowError);
  });

  it("stores the codes verbatim without validating them", () => {
    registry.registerWorkflow("odd", [7777, 4000, 7777]);
    expect(registry.findWorkflow("odd")).toEqual([7777, 4000, 7777]);
  });

  it("keeps its own copy of the code list", () => {
    const codes = [4000];
    registry.registerWorkflow("daily", codes);
    codes.push(1000);
    expect(registry.findWorkflow("daily")).toEqual([4000]);
  });

  it("lists workflows in registration order as a detached map", () => {
    registry.registerWorkflow("daily", [4000]);
    registry.registerWorkflow("monthly", [1000, 4000]);
    const workflows = registry.listWorkflows();
    expect([...workflows]).toEqual([
      ["daily", [4000]],
      ["monthly", [1000, 4000]],
    ]);
    workflows.delete("daily");
    expect(registry.findWorkflow("daily")).toEqual([4000]);
  });
});
