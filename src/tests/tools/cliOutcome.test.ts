import { expect, test } from "vitest";
import { ConfigurationError, EmptyResultError, RenderError } from "../../errors.js";
import { outcomeForError } from "../../tools/cliOutcome.js";

test("an empty result prints a notice and exits 0", () => {
  expect(outcomeForError(new EmptyResultError())).toEqual({
    exitCode: 0,
    stream: "stdout",
    message: "ℹ️  No data produced from transcript; nothing written.",
  });
});

test("other errors print to stderr and exit 1", () => {
  expect(outcomeForError(new ConfigurationError("Unknown argument: --bogus (see --help)"))).toEqual({
    exitCode: 1,
    stream: "stderr",
    message: "❌ Unknown argument: --bogus (see --help)",
  });
  expect(outcomeForError(new RenderError())).toEqual({ exitCode: 1, stream: "stderr", message: "❌ No data to plot." });
  expect(outcomeForError("boom")).toEqual({ exitCode: 1, stream: "stderr", message: "❌ boom" });
});
