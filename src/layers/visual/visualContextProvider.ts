import { readFile } from "node:fs/promises";
import path from "node:path";

import type { VisualContext, VisualImage } from "../../domain/models.js";
import { asString, asStringArray, isObject } from "../../utils/json.js";

export interface VisualContextProvider {
  /** Resolves to null when no context exists under `id`. */
  resolve(id: string): Promise<VisualContext | null>;
}

export class InMemoryVisualContextProvider implements VisualContextProvider {
  private readonly contexts: Map<string, VisualContext>;

  constructor(contexts: VisualContext[] = []) {
    this.contexts = new Map(contexts.map((context) => [context.id, context]));
  }

  async resolve(id: string): Promise<VisualContext | null> {
    return this.contexts.get(id) ?? null;
  }
}

const MEDIA_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp"
};

/**
 * Reads contexts written by the diagram extractor: `<directory>/<id>.json`
 * holds `{ text, images: [file names], imageReference?, description?,
 * sourceDocument?, pageNumber? }` with image paths relative to the directory.
 */
export class DirectoryVisualContextProvider implements VisualContextProvider {
  private readonly cache = new Map<string, Promise<VisualContext | null>>();

  constructor(private readonly directory: string) {}

  resolve(id: string): Promise<VisualContext | null> {
    const cached = this.cache.get(id);
    if (cached) {
      return cached;
    }

    const pending = this.load(id);
    this.cache.set(id, pending);
    return pending;
  }

  private async load(id: string): Promise<VisualContext | null> {
    const manifestPath = path.join(this.directory, `${path.basename(id)}.json`);

    let raw: string;
    try {
      raw = await readFile(manifestPath, "utf8");
    } catch (error) {
      if (isObject(error) && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }

    const manifest: unknown = JSON.parse(raw);
    if (!isObject(manifest)) {
      throw new Error(`Visual context manifest ${manifestPath} is not a JSON object.`);
    }

    const imageFiles = asStringArray(manifest.images);
    const images = await Promise.all(imageFiles.map((fileName) => this.readImage(fileName)));
    const pageNumber = typeof manifest.pageNumber === "number" ? manifest.pageNumber : undefined;

    return {
      id,
      text: asString(manifest.text),
      images,
      imageReference: asString(manifest.imageReference) || imageFiles[0],
      description: asString(manifest.description) || undefined,
      sourceDocument: asString(manifest.sourceDocument) || undefined,
      pageNumber
    };
  }

  private async readImage(fileName: string): Promise<VisualImage> {
    const data = await readFile(path.join(this.directory, fileName));
    const mediaType = MEDIA_TYPES[path.extname(fileName).toLowerCase()] ?? "application/octet-stream";
    return { data: new Uint8Array(data), mediaType };
  }
}
