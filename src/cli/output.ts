import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
} from "../core/error-format.js";

export type OutputStream = {
  write(chunk: string): unknown;
  isTTY?: boolean;
};

export function printCliError(
  error: unknown,
  opts: { debug?: boolean; stream?: OutputStream } = {},
): void {
  const stream = opts.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream }));
  const lines = formatErrorLines(error, { mode: opts.debug ? "debug" : "short" });

  for (const line of lines) {
    stream.write(styleLine(line, format) + "\n");
  }
}

function styleLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return format(`Error: ${line.text}`, ["bold", "red"]);
    case "hint":
      return format(`Hint: ${line.text}`, ["yellow"]);
    case "next":
      return format(`Next: ${line.text}`, ["cyan"]);
    case "code":
    case "name":
    case "cause":
      return format(`${line.kind}: ${line.text}`, ["dim"]);
    case "stack":
      return format(line.text, ["dim"]);
    default:
      return line.text;
  }
}
