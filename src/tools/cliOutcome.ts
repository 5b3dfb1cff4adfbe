import { EmptyResultError } from "../errors.js";

export type CliOutcome = {
  exitCode: number;
  stream: "stdout" | "stderr";
  message: string;
};

/** An empty result is a notice, not a failure; anything else exits 1. */
export function outcomeForError(err: unknown): CliOutcome {
  if (err instanceof EmptyResultError) {
    return { exitCode: 0, stream: "stdout", message: `ℹ️  ${err.message.replace(/\.+$/, "")}; nothing written.` };
  }
  return { exitCode: 1, stream: "stderr", message: `❌ ${err instanceof Error ? err.message : String(err)}` };
}
