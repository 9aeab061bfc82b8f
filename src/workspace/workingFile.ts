import { readFile, utimes, writeFile } from "node:fs/promises";

export const readWorkingFile = (path: string): Promise<string> => readFile(path, "utf8");

/** Bumps atime/mtime so mtime-keyed build tools (lake) re-check the file. */
export const touch = async (path: string, at: Date = new Date()): Promise<void> => {
  await utimes(path, at, at);
};

export const writeWorkingFile = async (path: string, content: string): Promise<void> => {
  await writeFile(path, content, "utf8");
  await touch(path);
};
