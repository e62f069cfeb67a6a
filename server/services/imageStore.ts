/**
 * Image Store
 *
 * Persists accepted leaf images and hands back an opaque locator that is
 * recorded on the ImageResult. The local implementation writes under
 * UPLOAD_DIR and returns file:// URIs.
 */

import { randomUUID } from "crypto";
import * as fs from "fs/promises";
import * as path from "path";

export interface StoredImage {
  name: string;
  data: Buffer;
  format: string;
}

export interface ImageStore {
  save(ownerId: string, image: StoredImage): Promise<string>;
}

const EXTENSIONS: Record<string, string> = {
  jpeg: "jpg",
  png: "png",
  webp: "webp",
};

function safeSegment(value: string): string {
  return value.replace(/[^a-zA-Z0-9_-]/g, "_") || "_";
}

export class LocalImageStore implements ImageStore {
  constructor(private readonly rootDir: string) {}

  async save(ownerId: string, image: StoredImage): Promise<string> {
    const ownerDir = path.join(this.rootDir, safeSegment(ownerId));
    await fs.mkdir(ownerDir, { recursive: true });

    const extension = EXTENSIONS[image.format] ?? "bin";
    const filePath = path.join(ownerDir, `${Date.now()}-${randomUUID()}.${extension}`);
    await fs.writeFile(filePath, image.data);

    return `file://${path.resolve(filePath)}`;
  }
}
