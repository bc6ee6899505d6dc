import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { z } from "zod";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, "../../package.json"), "utf-8")));

export const serverConfig = {
  name: "dcos-maintenance",
  version: packageJson.version,
  capabilities: {
    tools: {},
  },
} as const;
