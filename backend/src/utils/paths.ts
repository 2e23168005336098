import path from "path";
import { fileURLToPath } from "url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Repository-level `data/` directory, independent of the working directory. */
export function getDataPath(...segments: string[]): string {
  return path.resolve(__dirname, "../../../data", ...segments);
}

export function getDefaultFaqPath(fileName = "faq_en.json"): string {
  return getDataPath("faq", fileName);
}
