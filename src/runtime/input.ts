export class InputTooLargeError extends Error {
  constructor(readonly limit: number) {
    super(`Input exceeds ${limit} bytes`);
    this.name = "InputTooLargeError";
  }
}

/** Drain `stream` (normally STDIN) into a string, refusing more than `maxBytes`. */
export async function readInput(
  stream: AsyncIterable<Buffer | string>,
  maxBytes: number,
): Promise<string> {
  const chunks: Buffer[] = [];
  let total = 0;

  for await (const chunk of stream) {
    const buf = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    total += buf.byteLength;
    if (total > maxBytes) throw new InputTooLargeError(maxBytes);
    chunks.push(buf);
  }

  return Buffer.concat(chunks).toString("utf8").trimEnd();
}
