import fs from "node:fs";
import path from "node:path";

import { PathwayError } from "../../core/errors.js";

export const resolveInputFile = (file: string): string => {
  const resolved = path.resolve(file);
  if (!fs.existsSync(resolved)) {
    throw new PathwayError("CLI_INPUT_NOT_FOUND", `Input file does not exist: ${resolved}`);
  }
  const stat = fs.statSync(resolved);
  if (!stat.isFile()) {
    throw new PathwayError("CLI_INPUT_NOT_FOUND", `Input path is not a file: ${resolved}`);
  }
  return resolved;
};

export const openInput = (file: string): fs.ReadStream => {
  return fs.createReadStream(resolveInputFile(file));
};
