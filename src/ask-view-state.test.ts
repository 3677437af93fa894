import { describe, expect, it } from "vitest";
import { applyAskViewEvent, completeAskViewState, createAskViewState } from "./ask-view-state.js";

describe("ask view state", () => {
  it("tracks the latest status and clears it on the hidden status", () => {
    let state = createAskViewState();
    state = applyAskViewEvent(state, {
      type: "pipeline.status",
      payload: { run_id: "run-1", description: "Running OCR on 1 attached image(s)...", done: false, hidden: false },
    });
    expect(state).toMatchObject({ status: "Running OCR on 1 attached image(s)...", statusDone: false });

    state = applyAskViewEvent(state, {
      type: "pipeline.status",
      payload: { run_id: "run-1", description: "OCR complete.", done: true, hidden: false },
    });
    expect(state).toMatchObject({ status: "OCR complete.", statusDone: true });

    state = applyAskViewEvent(state, {
      type: "pipeline.status",
      payload: { run_id: "run-1", description: "", done: true, hidden: true },
    });
    expect(state.status).toBeNull();
  });

  it("collects previews and streamed text", () => {
    let state = createAskViewState();
    state = applyAskViewEvent(state, { type: "pipeline.message", payload: { run_id: "run-1", content: "preview" } });
    state = applyAskViewEvent(state, { type: "pipeline.chunk", payload: { run_id: "run-1", delta: "Hel" } });
    state = applyAskViewEvent(state, { type: "pipeline.chunk", payload: { run_id: "run-1", delta: "lo" } });

    expect(state).toEqual({ status: null, statusDone: false, previews: ["preview"], answer: "Hello", finished: false });
    expect(completeAskViewState(state, "Hello!")).toEqual({
      status: null,
      statusDone: true,
      previews: ["preview"],
      answer: "Hello!",
      finished: true,
    });
  });
});
