import fs from "fs";
import { JSON_READER } from "kryo-json/json-reader";
import sysPath from "path";

import {
  $ModuleDescription,
  AbcFile,
  generateModule,
  Library,
  LibraryRegistry,
  ModuleDescription,
  summarizeAbc,
} from "../lib/index.js";

async function main(): Promise<void> {
  if (process.argv.length < 3) {
    console.error("Usage: avm2-codegen <module.json> [library.json...]");
    return;
  }
  const [modulePath, ...libraryPaths] = process.argv.slice(2);
  const registry: LibraryRegistry = new LibraryRegistry();
  for (const libraryPath of libraryPaths) {
    registry.add(Library.read(await readTextFile(libraryPath)));
  }
  const description: ModuleDescription = $ModuleDescription.read(JSON_READER, await readTextFile(modulePath));
  const abc: AbcFile = generateModule(description, registry);
  console.log(JSON.stringify(summarizeAbc(abc), null, 2));
}

async function readTextFile(filePath: string): Promise<string> {
  return fs.promises.readFile(sysPath.resolve(filePath), {encoding: "utf-8"});
}

main()
  .catch((err: Error): never => {
    console.error(err.stack);
    process.exit(1);
  });
