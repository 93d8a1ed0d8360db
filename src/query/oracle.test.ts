/**
 * oracle.test.ts - Unit tests for the model-backed NL oracle
 *
 * Mocks the structured model at the system boundary; the prompt template is
 * read from prompts/ as in production.
 */

import { describe, it, expect, vi } from "vitest";
import { createModelOracle } from "./oracle";
import { OracleUnavailableError } from "../errors";

function createMockModel(answer: unknown) {
  return { invoke: vi.fn().mockResolvedValue(answer) };
}

describe("createModelOracle", () => {
  it("returns the validated answer", async () => {
    const model = createMockModel({
      resource_type: "Pod",
      namespace: null,
      labels: { app: "web" },
      confidence: 0.8,
    });

    const inference = await createModelOracle(model).infer("web pods", new AbortController().signal);

    expect(inference).toEqual({
      resource_type: "Pod",
      namespace: null,
      labels: { app: "web" },
      confidence: 0.8,
    });
  });

  it("sends the prompt as a system message and the query as a human message", async () => {
    const model = createMockModel({ confidence: 0.5 });

    await createModelOracle(model).infer("pods that restart a lot", new AbortController().signal);

    const messages = model.invoke.mock.calls[0][0];
    expect(messages).toHaveLength(2);
    expect(messages[0][0]).toBe("system");
    expect(messages[0][1]).toContain("resource_type");
    expect(messages[1]).toEqual(["human", "pods that restart a lot"]);
  });

  it("forwards the abort signal to the model", async () => {
    const model = createMockModel({ confidence: 0.5 });
    const controller = new AbortController();

    await createModelOracle(model).infer("pods", controller.signal);

    expect(model.invoke.mock.calls[0][1]).toEqual({ signal: controller.signal });
  });

  it("rejects an off-schema answer as malformed", async () => {
    const model = createMockModel({ resource_type: "Pod", confidence: 3 });

    const error = await createModelOracle(model)
      .infer("pods", new AbortController().signal)
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(OracleUnavailableError);
    expect(error).toMatchObject({ reason: "malformed" });
  });

  it("wraps model failures as unavailable", async () => {
    const model = { invoke: vi.fn().mockRejectedValue(new Error("overloaded")) };

    const error = await createModelOracle(model)
      .infer("pods", new AbortController().signal)
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(OracleUnavailableError);
    expect(error).toMatchObject({ reason: "failed", message: "overloaded" });
  });
});
