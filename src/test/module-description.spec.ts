import chai from "chai";
import { JSON_READER } from "kryo-json/json-reader";
import sysPath from "path";

import {
  $ModuleDescription,
  AbcFile,
  AbcSummary,
  generateModule,
  Library,
  LibraryRegistry,
  ModuleDescription,
  summarizeAbc,
} from "../lib/index.js";
import meta from "./meta.js";
import { assertIncident, readTextFile } from "./utils.js";

const TEST_SAMPLES_ROOT: string = sysPath.join(meta.dirname, "..", "..", "tests");

async function readSample(name: string): Promise<string> {
  return readTextFile(sysPath.join(TEST_SAMPLES_ROOT, name));
}

async function summarizeSample(): Promise<AbcSummary> {
  const library: Library = Library.read(await readSample("library.json"));
  const description: ModuleDescription = $ModuleDescription.read(JSON_READER, await readSample("module.json"));
  const abc: AbcFile = generateModule(description, new LibraryRegistry([library]));
  return summarizeAbc(abc);
}

describe("generateModule", function () {
  it("declares the classes in the script", async function () {
    const summary: AbcSummary = await summarizeSample();
    chai.assert.deepEqual(summary.scripts, [[
      {kind: "class", name: "game::Player"},
      {kind: "class", name: "game::Boss"},
    ]]);
  });

  it("declares fields and methods with their override flags", async function () {
    const summary: AbcSummary = await summarizeSample();
    chai.assert.deepEqual(summary.classes, [
      {
        name: "game::Player",
        superName: "flash.display::Sprite",
        instanceTraits: [
          {kind: "slot", name: "score"},
          {kind: "method", name: "toString", override: true},
          {kind: "method", name: "reset", override: false},
          {kind: "getter", name: "level", override: false},
        ],
        staticTraits: [
          {kind: "method", name: "create", override: false},
        ],
      },
      {
        name: "game::Boss",
        superName: "game::Player",
        instanceTraits: [
          {kind: "method", name: "reset", override: true},
        ],
        staticTraits: [],
      },
    ]);
  });

  it("assembles every method body", async function () {
    const summary: AbcSummary = await summarizeSample();
    // Player: iinit, 4 methods, cinit; Boss: iinit, 1 method, cinit; script init
    chai.assert.strictEqual(summary.methods, 10);
    chai.assert.lengthOf(summary.bodies, 10);
    chai.assert.deepEqual(summary.bodies[0], {
      method: "",
      code: "d030d0490047",
      maxStack: 1,
      localCount: 2,
      maxScopeDepth: 1,
      exceptions: [],
    });
    chai.assert.deepEqual(summary.bodies[1], {
      method: "toString",
      code: "d0302c0148",
      maxStack: 1,
      localCount: 1,
      maxScopeDepth: 1,
      exceptions: [],
    });
    chai.assert.strictEqual(summary.bodies[2].code, "d03047");
  });

  it("rejects unknown method kinds", function () {
    const description: ModuleDescription = {classes: [{name: "A", methods: [{name: "m", kind: "static"}]}]};
    assertIncident(() => generateModule(description), "InvalidMethodKind", {kind: "static"});
  });
});
