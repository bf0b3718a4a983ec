import fs from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { DocumentRef } from "../types";
import { CollaboratorError } from "./errors";
import { ObjectStore } from "./types";

/**
 * Filesystem stand-in for object storage: `<root>/<container>/<key>`.
 */
export class LocalObjectStore implements ObjectStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  resolvePath(ref: DocumentRef): string {
    const containerDir = path.resolve(this.root, ref.container);
    const target = path.resolve(containerDir, ref.key);
    const insideContainer = path.relative(containerDir, target);
    if (
      path.relative(this.root, containerDir).startsWith("..") ||
      insideContainer.length === 0 ||
      insideContainer.startsWith("..") ||
      path.isAbsolute(insideContainer)
    ) {
      throw new CollaboratorError(`Object reference escapes the storage root: ${ref.container}/${ref.key}`, false);
    }
    return target;
  }

  async getObject(ref: DocumentRef): Promise<Buffer> {
    return fs.promises.readFile(this.resolvePath(ref));
  }

  async putObject(ref: DocumentRef, body: string, _contentType: string): Promise<string> {
    const target = this.resolvePath(ref);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    const tempPath = `${target}.${process.pid}.tmp`;
    await fs.promises.writeFile(tempPath, body, "utf-8");
    await fs.promises.rename(tempPath, target);
    return pathToFileURL(target).href;
  }

  async deleteObject(ref: DocumentRef): Promise<void> {
    await fs.promises.rm(this.resolvePath(ref), { force: true });
  }
}
