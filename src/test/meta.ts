import sysPath from "path";
import { fileURLToPath } from "url";

export default {
  dirname: sysPath.dirname(fileURLToPath(import.meta.url)),
};
