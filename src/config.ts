import * as path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const EnvSchema = z.object({
  FORMS_DIR: z.string().min(1).optional(),
  FORM_SERVER_NAME: z.string().min(1).default("form-lifecycle-mcp"),
  FORM_SERVER_VERSION: z.string().min(1).default("0.1.0"),
});

export type ServerConfig = {
  /** Directory scanned for `*.json` form definitions. */
  formsDir: string;
  serverName: string;
  serverVersion: string;
};

/**
 * Reads server settings from the environment. Without `FORMS_DIR` the
 * definitions are looked up in `src/forms` under the project root, which
 * resolves the same from `src/` and from `dist/`.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const parsed = EnvSchema.parse(env);
  return {
    formsDir: path.resolve(parsed.FORMS_DIR ?? path.join(__dirname, "..", "src", "forms")),
    serverName: parsed.FORM_SERVER_NAME,
    serverVersion: parsed.FORM_SERVER_VERSION,
  };
}
