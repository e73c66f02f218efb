import { existsSync, readFileSync } from "node:fs";

export const parseEnvFile = (content: string): Record<string, string> => {
  const out: Record<string, string> = {};

  for (const rawLine of content.split("\n")) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;

    const withoutExport = line.startsWith("export ")
      ? line.slice("export ".length).trim()
      : line;

    const eq = withoutExport.indexOf("=");
    if (eq <= 0) continue;

    const key = withoutExport.slice(0, eq).trim();
    let value = withoutExport.slice(eq + 1).trim();

    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }

    if (key) out[key] = value;
  }

  return out;
};

// Variables already present in the environment win over the file.
export const loadEnvFile = (path: string): boolean => {
  if (!existsSync(path)) return false;

  const envVars = parseEnvFile(readFileSync(path, "utf8"));

  for (const [k, v] of Object.entries(envVars)) {
    if (process.env[k] == null) process.env[k] = v;
  }

  return true;
};
