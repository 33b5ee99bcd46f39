import { describe, it, expect } from "vitest";
import { StateStoreError } from "../errors";
import { ResearchStateStore } from "../services/research-engine/state-store";
import { workerResult } from "./helpers";

describe("ResearchStateStore", () => {
  it("assembles results in registration order", () => {
    const store = new ResearchStateStore();
    store.register("past");
    store.register("future");
    store.register("culture");

    store.commit("culture", workerResult("culture", "completed"));
    store.commit("past", workerResult("past", "failed"));
    expect(store.pending()).toEqual(["future"]);
    store.commit("future", workerResult("future", "partially_completed"));

    const aggregate = store.assemble();
    expect([...aggregate.keys()]).toEqual(["past", "future", "culture"]);
    expect(aggregate.get("past")?.status).toBe("failed");
  });

  it("rejects duplicate registration", () => {
    const store = new ResearchStateStore();
    store.register("past");
    expect(() => store.register("past")).toThrow("Domain past is already registered");
  });

  it("writes each slot once", () => {
    const store = new ResearchStateStore();
    store.register("past");
    store.commit("past", workerResult("past", "completed"));

    expect(store.has("past")).toBe(true);
    expect(() => store.commit("past", workerResult("past", "failed"))).toThrow(
      "Domain past already has a result"
    );
  });

  it("rejects unknown and mismatched domains", () => {
    const store = new ResearchStateStore();
    store.register("past");

    expect(() => store.commit("future", workerResult("future", "completed"))).toThrow(
      StateStoreError
    );
    expect(() => store.commit("past", workerResult("culture", "completed"))).toThrow(
      "Result for culture cannot be stored under past"
    );
  });

  it("refuses to assemble with empty slots", () => {
    const store = new ResearchStateStore();
    store.register("past");
    store.register("future");
    store.commit("past", workerResult("past", "completed"));

    expect(() => store.assemble()).toThrow("Cannot assemble: no result for future");
  });

  it("is closed after assembly", () => {
    const store = new ResearchStateStore();
    store.register("past");
    store.commit("past", workerResult("past", "completed"));
    store.assemble();

    expect(() => store.register("future")).toThrow("State store has already been assembled");
  });
});
