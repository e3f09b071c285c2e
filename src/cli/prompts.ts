import { createInterface } from "node:readline/promises";

type PromptInput = NodeJS.ReadableStream & { setRawMode?: (mode: boolean) => unknown };

export type PromptStreams = {
  input: PromptInput;
  /** Prompts go to stderr so stdout stays clean for piping. */
  output: NodeJS.WritableStream;
};

const CTRL_C = "\u0003";
const BACKSPACE = "\u007f";

function processStreams(): PromptStreams {
  return { input: process.stdin, output: process.stderr };
}

/** A prompt can only be answered when stdin is a terminal. */
export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY);
}

function requireInteractive(what: string): void {
  if (!isInteractive()) {
    throw new Error(`Cannot prompt for ${what} in a non-interactive session.`);
  }
}

/** True only for an exact `yes` answer. */
export async function readConfirmation(question: string, streams: PromptStreams): Promise<boolean> {
  const rl = createInterface({ input: streams.input, output: streams.output, terminal: false });
  try {
    const answer = await rl.question(question);
    return answer.trim() === "yes";
  } finally {
    rl.close();
  }
}

export async function confirmYes(question: string): Promise<boolean> {
  requireInteractive("confirmation");
  return readConfirmation(question, processStreams());
}

/**
 * Reads one line without echoing it. Input is taken a character at a time, so
 * a pasted token that ends in a newline completes the prompt.
 */
export function readSecret(prompt: string, streams: PromptStreams): Promise<string> {
  const { input, output } = streams;

  return new Promise((resolve, reject) => {
    let secret = "";

    const cleanup = () => {
      input.setRawMode?.(false);
      input.pause();
      input.off("data", onData);
    };

    const onData = (data: Buffer | string) => {
      for (const char of data.toString()) {
        if (char === "\r" || char === "\n") {
          output.write("\n");
          cleanup();
          resolve(secret);
          return;
        }
        if (char === CTRL_C) {
          cleanup();
          reject(new Error("Secret input cancelled."));
          return;
        }
        secret = char === BACKSPACE ? secret.slice(0, -1) : secret + char;
      }
    };

    output.write(prompt);
    input.setRawMode?.(true);
    input.resume();
    input.on("data", onData);
  });
}

export async function promptSecret(prompt: string): Promise<string> {
  requireInteractive("secrets");
  return readSecret(prompt, processStreams());
}
