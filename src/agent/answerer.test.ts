/**
 * answerer.test.ts - Unit tests for the agent path
 *
 * The cluster client and composer are stubs; no oracle is configured, so
 * every prompt here goes through keyword matching alone.
 */

import { describe, it, expect, vi } from "vitest";
import { answerAgentQuery, createModelComposer, type AgentDeps, type AnswerComposer } from "./answerer";
import { ClusterRegistry } from "../clusters/registry";
import { ClusterResolver } from "../clusters/resolver";
import type { ClusterClient } from "../engine/cluster-client";
import type { KubeObject } from "../engine/normalize";
import type { ResourceEvent } from "../engine/types";
import { ClusterFetchError, InvalidFilterError, UnknownClusterError } from "../errors";

function pod(name: string, namespace: string, phase: string): KubeObject {
  return { metadata: { name, namespace }, status: { phase } };
}

const pods = [
  pod("api-1", "shop", "Running"),
  pod("api-2", "shop", "Pending"),
  pod("coredns", "kube-system", "Running"),
];

const schedulingEvent: ResourceEvent = {
  type: "Warning",
  reason: "FailedScheduling",
  message: "0/3 nodes are available: insufficient cpu",
  count: 3,
  at: new Date("2024-06-10T14:50:00Z"),
};

function fakeClient(objects: KubeObject[] | Error = pods) {
  const describeSpy = vi.fn<ClusterClient["describe"]>().mockResolvedValue("Name: api-1\nStatus: Running\n");
  const eventsSpy = vi.fn<ClusterClient["events"]>().mockResolvedValue([schedulingEvent]);
  const logsSpy = vi.fn<ClusterClient["logs"]>().mockResolvedValue("");
  const client: ClusterClient = {
    list: () => (objects instanceof Error ? Promise.reject(objects) : Promise.resolve(objects)),
    describe: describeSpy,
    events: eventsSpy,
    logs: logsSpy,
    ping: () => Promise.resolve(),
  };
  return { client, describeSpy, eventsSpy, logsSpy };
}

const resolver = new ClusterResolver(
  new ClusterRegistry([
    { id: "prod", credentialRef: { source: "local", kubeconfigPath: "/kube/prod", context: null } },
  ])
);

function deps(overrides: Partial<AgentDeps> = {}): AgentDeps {
  return { resolver, client: fakeClient().client, onProgress: () => {}, ...overrides };
}

describe("answerAgentQuery", () => {
  it("summarizes a cluster from the collected facts when no composer is set", async () => {
    const answer = await answerAgentQuery("how many pods are there", "prod", deps());

    expect(answer).toEqual({
      clusterId: "prod",
      action: "summarize",
      answer: [
        "3 pods in cluster prod.",
        "By status: Running 2, Pending 1",
        "By namespace: shop 2, kube-system 1",
      ].join("\n"),
      composedBy: "facts",
      suggestions: [],
      matchedCount: 3,
      warnings: [],
    });
  });

  it("uses the only configured cluster when none is named", async () => {
    const answer = await answerAgentQuery("list pods", undefined, deps());
    expect(answer.clusterId).toBe("prod");
    expect(answer.action).toBe("list");
  });

  it("treats a question without a kind as a question about pods", async () => {
    const answer = await answerAgentQuery("how healthy is this cluster", "prod", deps());

    expect(answer.action).toBe("summarize");
    expect(answer.answer.split("\n")[0]).toBe("3 pods in cluster prod.");
    expect(answer.warnings).toEqual(["NL oracle not configured; used keyword matching only"]);
  });

  it("describes the one resource a name points at", async () => {
    const { client, describeSpy } = fakeClient();

    const answer = await answerAgentQuery("describe pod api-1", "prod", deps({ client }));

    expect(answer.action).toBe("describe");
    expect(answer.answer).toBe("Pod shop/api-1 in cluster prod:\nName: api-1\nStatus: Running");
    expect(describeSpy).toHaveBeenCalledWith(
      "Pod",
      "api-1",
      "shop",
      expect.objectContaining({ clusterId: "prod" }),
      expect.any(AbortSignal)
    );
  });

  it("lists candidates instead of guessing when a name is ambiguous", async () => {
    const { client, describeSpy } = fakeClient();

    const answer = await answerAgentQuery("describe pod api", "prod", deps({ client }));

    expect(answer.answer).toBe(
      [
        '"api" matches more than one pod; name one exactly to describe it.',
        "2 pods in cluster prod match:",
        "- shop/api-1 (Running)",
        "- shop/api-2 (Pending)",
      ].join("\n")
    );
    expect(describeSpy).not.toHaveBeenCalled();
  });

  it("falls back to the listing when describe fails", async () => {
    const { client, describeSpy } = fakeClient();
    describeSpy.mockRejectedValue(new ClusterFetchError("AuthError", "prod", "forbidden"));

    const answer = await answerAgentQuery("describe pod api-1", "prod", deps({ client }));

    expect(answer.answer).toBe("1 pod in cluster prod matches:\n- shop/api-1 (Running)");
    expect(answer.warnings).toEqual(["Could not read shop/api-1 details: forbidden"]);
  });

  it("diagnoses a pod from its events and logs, whatever its status", async () => {
    const { client, eventsSpy, logsSpy, describeSpy } = fakeClient();

    const answer = await answerAgentQuery("diagnose the failing pod api-2", "prod", deps({ client }));

    expect(answer.action).toBe("diagnose");
    expect(answer.answer).toBe(
      [
        "Pod shop/api-2 in cluster prod (status Pending).",
        "",
        "Events (newest first):",
        "- [Warning] FailedScheduling x3: 0/3 nodes are available: insufficient cpu (2024-06-10T14:50:00.000Z)",
        "",
        "Logs: empty.",
      ].join("\n")
    );
    expect(eventsSpy).toHaveBeenCalledWith(
      "api-2",
      "shop",
      expect.objectContaining({ clusterId: "prod" }),
      expect.any(AbortSignal)
    );
    expect(logsSpy).toHaveBeenCalledWith(
      "api-2",
      "shop",
      50,
      expect.objectContaining({ clusterId: "prod" }),
      expect.any(AbortSignal)
    );
    expect(describeSpy).not.toHaveBeenCalled();
  });

  it("keeps the events when the logs cannot be read", async () => {
    const { client, logsSpy } = fakeClient();
    logsSpy.mockRejectedValue(new ClusterFetchError("AuthError", "prod", "forbidden"));

    const answer = await answerAgentQuery("diagnose pod api-2", "prod", deps({ client }));

    expect(answer.answer.split("\n").slice(-1)).toEqual(["Logs: unavailable."]);
    expect(answer.answer).toContain("- [Warning] FailedScheduling x3");
    expect(answer.warnings).toEqual(["Could not read logs for shop/api-2: forbidden"]);
  });

  it("returns the composer's recommendations as suggestions", async () => {
    const composed = [
      "api-2 cannot be scheduled.",
      "",
      "**Issues**",
      "- No node has enough free CPU",
      "",
      "**Recommendations**",
      "- Check node capacity with `kubectl describe nodes`",
      "- Lower the pod's CPU request",
    ].join("\n");
    const composer: AnswerComposer = { compose: () => Promise.resolve(composed) };

    const answer = await answerAgentQuery("diagnose pod api-2", "prod", deps({ composer }));

    expect(answer.composedBy).toBe("model");
    expect(answer.suggestions).toEqual([
      "Check node capacity with `kubectl describe nodes`",
      "Lower the pod's CPU request",
    ]);
  });

  it("passes the facts to the composer and returns its answer", async () => {
    const compose = vi.fn<AnswerComposer["compose"]>().mockResolvedValue("Two of three pods are running.");

    const answer = await answerAgentQuery("how many pods are there", "prod", deps({ composer: { compose } }));

    expect(answer.answer).toBe("Two of three pods are running.");
    expect(answer.composedBy).toBe("model");
    expect(compose.mock.calls[0][0]).toEqual({
      prompt: "how many pods are there",
      clusterId: "prod",
      action: "summarize",
      facts: "3 pods in cluster prod.\nBy status: Running 2, Pending 1\nBy namespace: shop 2, kube-system 1",
    });
  });

  it("returns the facts with a warning when the composer fails", async () => {
    const composer: AnswerComposer = { compose: () => Promise.reject(new Error("overloaded")) };

    const answer = await answerAgentQuery("list pods", "prod", deps({ composer }));

    expect(answer.composedBy).toBe("facts");
    expect(answer.answer.split("\n")[0]).toBe("3 pods in cluster prod match:");
    expect(answer.warnings).toEqual([
      "Answer composer unavailable (overloaded); returned the collected facts",
    ]);
  });

  it("notes a cluster named in the prompt that is not the one queried", async () => {
    const answer = await answerAgentQuery("list pods in cluster staging", "prod", deps());
    expect(answer.warnings).toEqual([
      'Ignored cluster "staging" in the prompt; answering for prod',
    ]);
  });

  it("rejects an unknown cluster", async () => {
    await expect(answerAgentQuery("list pods", "qa", deps())).rejects.toBeInstanceOf(
      UnknownClusterError
    );
  });

  it("rejects a prompt that names nothing to look at", async () => {
    await expect(answerAgentQuery("what is going on", "prod", deps())).rejects.toBeInstanceOf(
      InvalidFilterError
    );
  });

  it("fails the request when its one cluster cannot be read", async () => {
    const { client } = fakeClient(new ClusterFetchError("Timeout", "prod", "i/o timeout"));

    await expect(answerAgentQuery("list pods", "prod", deps({ client }))).rejects.toMatchObject({
      kind: "Timeout",
      clusterId: "prod",
      message: "i/o timeout",
    });
  });
});

describe("createModelComposer", () => {
  it("sends the system prompt and the collected facts", async () => {
    const invoke = vi.fn().mockResolvedValue("answer");
    const composer = createModelComposer({ invoke });
    const signal = new AbortController().signal;

    await composer.compose(
      { prompt: "list pods", clusterId: "prod", action: "list", facts: "No pods in cluster prod match." },
      signal
    );

    const [messages, options] = invoke.mock.calls[0];
    expect(messages[0][0]).toBe("system");
    expect(messages[0][1]).toContain("You answer questions about a Kubernetes cluster");
    expect(messages[1]).toEqual([
      "human",
      "Question: list pods\nCluster: prod\nAction taken: list\n\nFacts collected:\nNo pods in cluster prod match.",
    ]);
    expect(options).toEqual({ signal });
  });
});
