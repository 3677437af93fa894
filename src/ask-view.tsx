import React from "react";
import { Box, render, Text } from "ink";
import Spinner from "ink-spinner";
import type { RuntimeEvent } from "./core/runtime.js";
import {
  applyAskViewEvent,
  completeAskViewState,
  createAskViewState,
  type AskViewState,
} from "./ask-view-state.js";

export function AskView({ state }: { state: AskViewState }) {
  return (
    <Box flexDirection="column">
      {state.status ? (
        <Box>
          <Text color={state.statusDone ? "green" : "yellow"}>
            {state.statusDone ? "✓" : <Spinner type="dots" />}{" "}
          </Text>
          <Text color="white">{state.status}</Text>
        </Box>
      ) : null}
      {state.previews.map((preview, index) => (
        <Text key={index} color="gray">
          {preview}
        </Text>
      ))}
      {!state.finished && state.answer ? <Text color="cyanBright">{state.answer}</Text> : null}
    </Box>
  );
}

export type AskViewHandle = {
  apply: (event: RuntimeEvent) => void;
  finish: (content: string) => void;
};

// Progress is drawn on stderr; the final answer is left for stdout.
export function mountAskView(stream: NodeJS.WriteStream = process.stderr): AskViewHandle {
  let state = createAskViewState();
  const instance = render(<AskView state={state} />, { stdout: stream });

  return {
    apply: (event) => {
      state = applyAskViewEvent(state, event);
      instance.rerender(<AskView state={state} />);
    },
    finish: (content) => {
      state = completeAskViewState(state, content);
      instance.rerender(<AskView state={state} />);
      instance.unmount();
    },
  };
}
