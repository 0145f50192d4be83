import { createInterface } from "node:readline";
import { PROMPT_QUESTION, type Prompt } from "./prune.js";

export type PromptStreams = {
  readonly input: NodeJS.ReadableStream;
  readonly output: NodeJS.WritableStream;
};

/**
 * Runs `run` with a prompt that takes one line of `input` per question.
 * Lines are queued, so answers piped in ahead of time are not lost. End of
 * input answers "quit".
 */
export const withLinePrompt = async <T>(
  run: (prompt: Prompt) => Promise<T>,
  { input, output }: PromptStreams
): Promise<T> => {
  const rl = createInterface({ input, crlfDelay: Infinity });
  const lines = rl[Symbol.asyncIterator]();

  const prompt: Prompt = async () => {
    output.write(PROMPT_QUESTION);
    const next = await lines.next();
    return next.done ? "quit" : next.value;
  };

  try {
    return await run(prompt);
  } finally {
    rl.close();
  }
};
