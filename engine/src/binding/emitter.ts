/**
 * desktop-repack Engine — Stub Binding Project Emitter
 *
 * Renders a napi-rs project (Cargo.toml, src/lib.rs, package.json) whose
 * exports match the binding surface table. Built with `napi build`, it
 * yields `<crate>.linux-x64-gnu.node`, which replaces the vendor binding
 * inside the repacked app.
 */

import * as fs from "fs";
import * as path from "path";
import {
  BINDING_ENUMS,
  BINDING_FUNCTIONS,
  BINDING_STRUCTS,
  BindingEnum,
  BindingOperation,
  BindingStruct,
  INPUT_EMULATOR_CLASS,
  INPUT_EMULATOR_METHODS,
  RustType,
  StubValue,
  toJsName,
} from "./surface";

const NAPI_VERSION = "2.12.2";
const NAPI_CLI_VERSION = "^2.18.4";
const LINUX_TRIPLE = "x86_64-unknown-linux-gnu";

/** Relative path → file content */
export type ProjectFiles = Record<string, string>;

// ─── Values ──────────────────────────────────────────────────────

function rustString(s: string): string {
  return `"${s.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

const VEC_ELEMENT: Record<"Vec<i32>" | "Vec<u16>" | "Vec<WindowInfo>", RustType> = {
  "Vec<i32>": "i32",
  "Vec<u16>": "u16",
  "Vec<WindowInfo>": "WindowInfo",
};

function findStruct(name: string): BindingStruct | undefined {
  return BINDING_STRUCTS.find((s) => s.name === name);
}

function pad(depth: number): string {
  return "    ".repeat(depth);
}

/**
 * Render a stub value as a Rust expression of the given type.
 *
 * @throws Error if the value does not fit the type (a broken surface table)
 */
export function renderRustValue(
  type: RustType,
  value: StubValue,
  depth: number = 1,
): string {
  const mismatch = () =>
    new Error(`Stub value ${JSON.stringify(value)} does not fit ${type}`);

  switch (type) {
    case "bool":
      if (typeof value !== "boolean") throw mismatch();
      return String(value);
    case "u16":
    case "u32":
    case "i32":
      if (typeof value !== "number" || !Number.isInteger(value)) {
        throw mismatch();
      }
      return String(value);
    case "String":
      if (typeof value !== "string") throw mismatch();
      return `${rustString(value)}.to_string()`;
    case "Vec<i32>":
    case "Vec<u16>":
    case "Vec<WindowInfo>": {
      if (!Array.isArray(value)) throw mismatch();
      const items = value.map((v) => renderRustValue(VEC_ELEMENT[type], v, depth));
      return `vec![${items.join(", ")}]`;
    }
    case "MonitorInfo":
    case "MousePosition":
    case "WindowInfo": {
      const struct = findStruct(type);
      if (!struct || typeof value !== "object" || Array.isArray(value)) {
        throw mismatch();
      }
      const fields = struct.fields.map((field) => {
        const fieldValue = value[toJsName(field.name)];
        if (fieldValue === undefined) throw mismatch();
        return `${pad(depth + 1)}${field.name}: ${renderRustValue(field.type, fieldValue, depth + 1)},`;
      });
      return `${type} {\n${fields.join("\n")}\n${pad(depth)}}`;
    }
  }
}

// ─── Declarations ────────────────────────────────────────────────

function renderEnum(e: BindingEnum): string {
  const variants = e.variants.map((v) =>
    v.value === undefined
      ? `    ${v.name},`
      : `    ${v.name} = ${v.value},`,
  );
  return `#[napi]\npub enum ${e.name} {\n${variants.join("\n")}\n}`;
}

function renderStruct(s: BindingStruct): string {
  const fields = s.fields.map((f) => `    pub ${f.name}: ${f.type},`);
  return `#[napi]\npub struct ${s.name} {\n${fields.join("\n")}\n}`;
}

/**
 * The diagnostic line printed on every call, with the arguments
 * interpolated (strings quoted, vectors debug-printed).
 */
export function renderLogFormat(op: BindingOperation): string {
  const args = op.params.map((p) => {
    if (p.type === "String") return `'{${p.name}}'`;
    if (p.type.startsWith("Vec<")) return `{${p.name}:?}`;
    return `{${p.name}}`;
  });
  return [op.label, ...args].join(" ");
}

function renderOperation(op: BindingOperation, depth: number, isMethod: boolean): string {
  const indent = pad(depth);
  const params = op.params.map((p) => `${p.name}: ${p.type}`);
  if (isMethod && op.takes_self !== false) {
    params.unshift("&self");
  }
  const returns = op.returns ? ` -> ${op.returns}` : "";

  const body = [`${indent}    println!(${rustString(renderLogFormat(op))});`];
  if (op.returns && op.stub !== null) {
    body.push(`${indent}    ${renderRustValue(op.returns, op.stub, depth + 1)}`);
  }

  return [
    `${indent}#[napi]`,
    `${indent}pub fn ${op.name}(${params.join(", ")})${returns} {`,
    ...body,
    `${indent}}`,
  ].join("\n");
}

// ─── Project Files ───────────────────────────────────────────────

export function renderLibRs(): string {
  const sections = [
    "#![deny(clippy::all)]",
    "#[macro_use]\nextern crate napi_derive;",
    ...BINDING_ENUMS.map(renderEnum),
    ...BINDING_STRUCTS.map(renderStruct),
    ...BINDING_FUNCTIONS.map((op) => renderOperation(op, 0, false)),
    `#[napi(constructor)]\npub struct ${INPUT_EMULATOR_CLASS} {}`,
    [
      "#[napi]",
      `impl ${INPUT_EMULATOR_CLASS} {`,
      INPUT_EMULATOR_METHODS.map((op) => renderOperation(op, 1, true)).join("\n\n"),
      "}",
    ].join("\n"),
  ];
  return sections.join("\n\n") + "\n";
}

export function renderCargoToml(crate: string): string {
  return [
    "[package]",
    `name = "${crate}"`,
    'version = "0.1.0"',
    'edition = "2021"',
    "",
    "[lib]",
    'crate-type = ["cdylib"]',
    "",
    "[dependencies]",
    `napi = { version = "${NAPI_VERSION}", default-features = false, features = ["napi4"] }`,
    `napi-derive = "${NAPI_VERSION}"`,
    "",
  ].join("\n");
}

export function renderPackageJson(crate: string): string {
  const manifest = {
    name: crate,
    version: "0.1.0",
    main: "index.js",
    napi: {
      name: crate,
      triples: {
        defaults: false,
        additional: [LINUX_TRIPLE],
      },
    },
    scripts: {
      build: "napi build --platform --release",
    },
    devDependencies: {
      "@napi-rs/cli": NAPI_CLI_VERSION,
    },
  };
  return JSON.stringify(manifest, null, 2) + "\n";
}

export function renderBindingProject(crate: string): ProjectFiles {
  return {
    "Cargo.toml": renderCargoToml(crate),
    "src/lib.rs": renderLibRs(),
    "package.json": renderPackageJson(crate),
  };
}

/**
 * Write rendered project files under `dir`, creating directories as needed.
 *
 * @returns Absolute paths of the written files
 */
export function writeProjectFiles(dir: string, files: ProjectFiles): string[] {
  const written: string[] = [];
  for (const [relPath, content] of Object.entries(files)) {
    const target = path.join(dir, relPath);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content, "utf-8");
    written.push(target);
  }
  return written;
}
