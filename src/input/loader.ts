import fs from "node:fs";
import { z } from "zod";
import { InputError } from "../budget/errors.js";
import type { CategorizedContent, RawContentItem } from "../budget/types.js";

export const rawItemSchema = z.object({
  id: z.string().min(1),
  text: z.string().min(1),
  priority: z.number().min(0).max(1),
});

/** `{ "<category>": [ { id, text, priority } ] }`; key order is category order. */
export const contentFileSchema = z.record(z.string().min(1), z.array(rawItemSchema));

/** Convert validated JSON into the engine's ordered category map. */
export function toCategorizedContent(
  data: Record<string, RawContentItem[]>,
): CategorizedContent {
  return new Map(Object.entries(data));
}

/** Parse and validate content JSON text. */
export function parseContent(raw: string, origin: string): CategorizedContent {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new InputError(`Invalid JSON in ${origin}: ${msg}`);
  }

  const parsed = contentFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new InputError(`Invalid content in ${origin}: ${issues}`);
  }
  return toCategorizedContent(parsed.data);
}

/** Load content from a JSON file. */
function loadFromFile(filePath: string): CategorizedContent {
  if (!fs.existsSync(filePath)) {
    throw new InputError(`Content file not found: ${filePath}`);
  }
  return parseContent(fs.readFileSync(filePath, "utf-8"), filePath);
}

/** Load content from stdin. */
async function loadFromStdin(stdin: NodeJS.ReadableStream): Promise<CategorizedContent> {
  return new Promise((resolve, reject) => {
    const chunks: string[] = [];
    stdin.setEncoding("utf-8");
    stdin.on("data", (chunk: string) => chunks.push(chunk));
    stdin.on("end", () => {
      const text = chunks.join("");
      if (!text.trim()) {
        reject(new InputError("No content received from stdin"));
        return;
      }
      try {
        resolve(parseContent(text, "stdin"));
      } catch (err: unknown) {
        reject(err);
      }
    });
    stdin.on("error", reject);
  });
}

/** Load content based on CLI options. */
export async function loadContent(
  options: { input?: string; stdin?: boolean },
  stdin: NodeJS.ReadableStream = process.stdin,
): Promise<CategorizedContent> {
  if (options.input) {
    return loadFromFile(options.input);
  }
  if (options.stdin) {
    return loadFromStdin(stdin);
  }
  throw new InputError("No content provided: pass --input <file> or --stdin");
}
