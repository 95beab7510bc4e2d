import fs from "node:fs";
import path from "node:path";

function unquote(val: string): string {
  const first = val.charAt(0);
  if ((first === "\"" || first === "'") && val.endsWith(first) && val.length >= 2) return val.slice(1, -1);
  return val;
}

export function parseDotEnv(raw: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim().replace(/^export\s+/, "");
    if (!trimmed || trimmed.startsWith("#")) continue;
    const idx = trimmed.indexOf("=");
    if (idx <= 0) continue;
    out[trimmed.slice(0, idx).trim()] = unquote(trimmed.slice(idx + 1).trim());
  }
  return out;
}

// Keys already present in the environment win over the file.
export function loadDotEnvFromCwd(fileName = ".env"): void {
  const filePath = path.resolve(process.cwd(), fileName);
  if (!fs.existsSync(filePath)) return;

  const vars = parseDotEnv(fs.readFileSync(filePath, "utf8"));
  for (const [key, val] of Object.entries(vars)) {
    if (process.env[key] === undefined) process.env[key] = val;
  }
}
