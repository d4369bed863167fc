import readline from "node:readline/promises";
import { Writable } from "node:stream";

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  terminal: boolean;
}

export interface Prompt {
  /** Resolves undefined once the prompt has been cancelled. */
  ask: (question: string) => Promise<string | undefined>;
  askSecret: (question: string) => Promise<string | undefined>;
  /** In terminal mode Ctrl-C reaches the interface, not the process. */
  onInterrupt: (listener: () => void) => void;
  /** Ends the pending question, and every later one, so stdin is released. */
  cancel: () => void;
  close: () => void;
}

/** Line prompt whose echo can be switched off for secrets. */
export const createPrompt = (streams: PromptStreams): Prompt => {
  let muted = false;
  const aborter = new AbortController();
  const output = new Writable({
    write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
      if (!muted) {
        streams.output.write(chunk);
      }
      callback();
    }
  });
  const rl = readline.createInterface({ input: streams.input, output, terminal: streams.terminal });

  const ask = async (question: string): Promise<string | undefined> => {
    if (aborter.signal.aborted) {
      return undefined;
    }
    try {
      return await rl.question(question, { signal: aborter.signal });
    } catch (error) {
      if (aborter.signal.aborted) {
        return undefined;
      }
      throw error;
    }
  };

  return {
    ask,
    askSecret: async (question) => {
      streams.output.write(question);
      muted = true;
      try {
        return await ask("");
      } finally {
        muted = false;
        streams.output.write("\n");
      }
    },
    onInterrupt: (listener) => {
      rl.on("SIGINT", listener);
    },
    cancel: () => {
      aborter.abort();
    },
    close: () => rl.close()
  };
};
