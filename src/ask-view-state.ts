import type { RuntimeEvent } from "./core/runtime.js";

export type AskViewState = {
  status: string | null;
  statusDone: boolean;
  previews: string[];
  answer: string;
  finished: boolean;
};

export function createAskViewState(): AskViewState {
  return {
    status: null,
    statusDone: false,
    previews: [],
    answer: "",
    finished: false,
  };
}

export function applyAskViewEvent(state: AskViewState, event: RuntimeEvent): AskViewState {
  switch (event.type) {
    case "pipeline.status":
      if (event.payload.hidden) {
        return { ...state, status: null, statusDone: true };
      }
      return { ...state, status: event.payload.description, statusDone: event.payload.done };
    case "pipeline.message":
      return { ...state, previews: [...state.previews, event.payload.content] };
    case "pipeline.chunk":
      return { ...state, answer: state.answer + event.payload.delta };
  }
}

export function completeAskViewState(state: AskViewState, content: string): AskViewState {
  return {
    ...state,
    status: null,
    statusDone: true,
    answer: content,
    finished: true,
  };
}
