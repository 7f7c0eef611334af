import fs from "fs";
import nodePath from "path";
import type { ModuleLoader } from "@ypsh/core";

export const SOURCE_EXTENSIONS = [".ypsh", ".pylo"];

/**
 * Loads modules from disk, relative to the importing file. `./util` also
 * finds `./util.ypsh`, then the older `./util.pylo`.
 */
export const fileModuleLoader: ModuleLoader = (path, base) => {
    const dir = nodePath.dirname(base);
    const resolved = nodePath.resolve(dir, path);

    for (const candidate of [
        resolved,
        ...SOURCE_EXTENSIONS.map((ext) => resolved + ext),
    ]) {
        if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
            return fs.readFileSync(candidate, "utf-8");
        }
    }
    return null;
};
