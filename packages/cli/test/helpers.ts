import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { TextWriter } from "../src/util/io.js";

export function captureWriter(): { writer: TextWriter; text: () => string } {
  const chunks: string[] = [];
  return {
    writer: {
      write: (text: string) => {
        chunks.push(text);
        return true;
      }
    },
    text: () => chunks.join("")
  };
}

/** Fresh temp dir populated with `files` (name -> contents). */
export async function tempDirWith(files: Record<string, string>): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "jsonassay-"));
  for (const [name, contents] of Object.entries(files)) {
    await fs.writeFile(path.join(dir, name), contents, "utf8");
  }
  return dir;
}
