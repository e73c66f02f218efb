import { readFile } from "node:fs/promises";

export const readJson = async <T>(path: string): Promise<T> => {
  const raw = await readFile(path, "utf8");

  return JSON.parse(raw) as T;
};
