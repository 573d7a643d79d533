import chai from "chai";
import fs from "fs";
import { Incident } from "incident";

import { Instruction, InstructionType } from "../lib/index.js";

export async function readTextFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, {encoding: "utf-8"});
}

/**
 * Runs `fn` and checks that it fails with the incident `name`. When `data` is
 * given, the incident data must include it.
 */
export function assertIncident(fn: () => unknown, name: string, data?: object): void {
  try {
    fn();
  } catch (err) {
    if (!(err instanceof Incident)) {
      throw err;
    }
    chai.assert.strictEqual(err.name, name);
    if (data !== undefined) {
      chai.assert.deepInclude(err.data, data);
    }
    return;
  }
  chai.assert.fail(`Expected a ${name} error`);
}

export function defined<T>(value: T | undefined | null): T {
  if (value === undefined || value === null) {
    throw chai.assert.fail("Expected a value");
  }
  return value;
}

/**
 * Textual listing of a sequence: `pushbyte 5`, `label:`, `<begintry>`...
 */
export function listing(instructions: readonly Instruction[]): string[] {
  return instructions.map((instruction: Instruction): string => {
    switch (instruction.type) {
      case InstructionType.Op:
        return [instruction.opcode.name, ...instruction.operands.map(String)].join(" ");
      case InstructionType.Label:
        return `${instruction.name}:`;
      case InstructionType.BeginTry:
        return "<begintry>";
      case InstructionType.EndTry:
        return "<endtry>";
      case InstructionType.AddExceptionInfo:
        return "<catch>";
    }
  });
}

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex");
}
