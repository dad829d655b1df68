import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Paper } from "../../domain/models.js";
import { slugify } from "../../utils/text.js";

export class PaperStore {
  constructor(private readonly outputDirectory: string) {}

  get papersDirectory(): string {
    return path.join(this.outputDirectory, "papers");
  }

  async persistPaper(paper: Paper): Promise<string> {
    await mkdir(this.papersDirectory, { recursive: true });

    const slug = slugify(`${paper.name}-${paper.id.slice(0, 8)}`) || paper.id;
    const filePath = path.join(this.papersDirectory, `${slug}.json`);
    await writeFile(filePath, JSON.stringify(paper, null, 2), "utf8");

    return filePath;
  }
}
