import { describe, it, expect } from "vitest";
import { createProgram } from "./index.js";

describe("createProgram", () => {
  it("registers every command", () => {
    const program = createProgram();

    expect(program.commands.map((c) => c.name())).toEqual(["download", "status", "ledger", "auth", "config"]);
  });

  it("reads its version from package.json", () => {
    expect(createProgram().version()).toBe("0.1.0");
  });

  it("declares the global output flags", () => {
    const flags = createProgram().options.map((o) => o.long);

    expect(flags).toEqual(expect.arrayContaining(["--json", "--quiet", "--yes", "--no-input"]));
  });

  it("nests the ledger and auth subcommands", () => {
    const program = createProgram();
    const sub = (name: string) =>
      program.commands.find((c) => c.name() === name)?.commands.map((c) => c.name());

    expect(sub("ledger")).toEqual(["list", "reset"]);
    expect(sub("auth")).toEqual(["import-curl", "show"]);
    expect(sub("config")).toEqual(["init", "validate", "show", "path"]);
  });
});
