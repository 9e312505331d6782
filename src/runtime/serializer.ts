import { encode } from "@toon-format/toon";

export type SerialFormat = "json" | "toon";

export interface SerializationOptions {
  format?: SerialFormat;
  pretty?: boolean;
}

export function serialize(obj: unknown, options: SerializationOptions = {}): string {
  const format = options.format ?? "json";

  switch (format) {
    case "toon":
      return encode(obj);

    case "json":
      return options.pretty ? JSON.stringify(obj, null, 2) : JSON.stringify(obj);
  }
}
