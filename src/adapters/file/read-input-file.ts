import { readFile } from "node:fs/promises";
import { AppError } from "../../infra/app-error.js";

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export async function readInputFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "EISDIR")) {
      throw new AppError(500, "missing_input_file", `Missing input file '${path}'.`);
    }
    throw error;
  }
}
