/**
 * desktop-repack Engine — Binding Surface Table
 *
 * Declarative description of every type and operation the stub binding
 * exports. emitter.ts renders the Rust source from this table; nothing else
 * describes the binding's shape.
 */

import {
  KEYBOARD_KEYS,
  STUB_ACTIVE_WINDOW_HANDLE,
  STUB_MONITOR,
  STUB_MOUSE_POSITION,
} from "./capabilities";

export type RustType =
  | "bool"
  | "u16"
  | "u32"
  | "i32"
  | "String"
  | "Vec<i32>"
  | "Vec<u16>"
  | "Vec<WindowInfo>"
  | "MonitorInfo"
  | "MousePosition"
  | "WindowInfo";

export type StubValue =
  | boolean
  | number
  | string
  | StubValue[]
  | { [field: string]: StubValue };

export interface EnumVariant {
  name: string;
  /** Explicit discriminant; omitted variants count up from the previous */
  value?: number;
}

export interface BindingEnum {
  name: string;
  variants: EnumVariant[];
}

export interface StructField {
  /** snake_case, as declared in Rust */
  name: string;
  type: RustType;
}

export interface BindingStruct {
  name: string;
  fields: StructField[];
}

export interface BindingParam {
  name: string;
  type: RustType;
}

export interface BindingOperation {
  /** snake_case Rust name; napi-rs exposes it in camelCase */
  name: string;
  params: BindingParam[];
  returns: RustType | null;
  /** Fixed value the stub returns (null for unit) */
  stub: StubValue | null;
  /** Prefix of the diagnostic line the stub prints */
  label: string;
  /** Methods only: false for an associated function without `&self` */
  takes_self?: boolean;
}

export const BINDING_ENUMS: BindingEnum[] = [
  { name: "KeyboardKey", variants: KEYBOARD_KEYS.map((name) => ({ name })) },
  {
    name: "ScrollDirection",
    variants: [
      { name: "Down", value: 0 },
      { name: "Up", value: 1 },
    ],
  },
  {
    name: "MouseButton",
    variants: [
      { name: "Left", value: 0 },
      { name: "Middle", value: 1 },
      { name: "Right", value: 2 },
    ],
  },
  {
    name: "RequestAccessibilityOptions",
    variants: [{ name: "ShowDialog" }, { name: "OnlyRegisterInSettings" }],
  },
];

export const BINDING_STRUCTS: BindingStruct[] = [
  {
    name: "MousePosition",
    fields: [
      { name: "x", type: "u32" },
      { name: "y", type: "u32" },
    ],
  },
  {
    name: "MonitorInfo",
    fields: [
      { name: "x", type: "u32" },
      { name: "y", type: "u32" },
      { name: "width", type: "u32" },
      { name: "height", type: "u32" },
      { name: "monitor_name", type: "String" },
      { name: "is_primary", type: "bool" },
    ],
  },
  {
    name: "WindowInfo",
    fields: [
      { name: "handle", type: "u32" },
      { name: "process_id", type: "u32" },
      { name: "executable_path", type: "String" },
      { name: "title", type: "String" },
      { name: "x", type: "u32" },
      { name: "y", type: "u32" },
      { name: "width", type: "u32" },
      { name: "height", type: "u32" },
    ],
  },
];

export const BINDING_FUNCTIONS: BindingOperation[] = [
  {
    name: "request_accessibility",
    params: [{ name: "options", type: "i32" }],
    returns: "bool",
    stub: true,
    label: "request_accessibility",
  },
  {
    name: "get_window_info",
    params: [],
    returns: "Vec<WindowInfo>",
    stub: [],
    label: "get_window_info",
  },
  {
    name: "get_active_window_handle",
    params: [],
    returns: "u32",
    stub: STUB_ACTIVE_WINDOW_HANDLE,
    label: "get_active_window_handle",
  },
  {
    name: "get_monitor_info",
    params: [],
    returns: "MonitorInfo",
    stub: STUB_MONITOR,
    label: "get_monitor_info",
  },
  {
    name: "focus_window",
    params: [{ name: "handle", type: "u32" }],
    returns: null,
    stub: null,
    label: "focus_window",
  },
];

/** Struct with a napi constructor that owns the input methods */
export const INPUT_EMULATOR_CLASS = "InputEmulator";

const unit = (name: string, label: string, params: BindingParam[] = []) => ({
  name,
  params,
  returns: null,
  stub: null,
  label: `IE ${label}`,
});

export const INPUT_EMULATOR_METHODS: BindingOperation[] = [
  unit("copy", "copy"),
  unit("cut", "cut"),
  unit("paste", "paste"),
  unit("undo", "undo"),
  unit("select_all", "select all"),
  {
    name: "held",
    params: [],
    returns: "Vec<u16>",
    stub: [],
    label: "IE held",
  },
  unit("press_chars", "press chars", [{ name: "text", type: "String" }]),
  unit("press_key", "press key", [{ name: "key", type: "Vec<i32>" }]),
  {
    ...unit("press_then_release_key", "press then release key", [
      { name: "key", type: "Vec<i32>" },
    ]),
    takes_self: false,
  },
  unit("release_chars", "release chars", [{ name: "text", type: "String" }]),
  unit("release_key", "release key", [{ name: "key", type: "u32" }]),
  unit("set_button_click", "set button click", [
    { name: "button", type: "i32" },
  ]),
  unit("set_button_toggle", "set button toggle", [
    { name: "button", type: "i32" },
  ]),
  {
    name: "get_mouse_position",
    params: [],
    returns: "MousePosition",
    stub: STUB_MOUSE_POSITION,
    label: "IE get mouse position",
  },
  unit("type_text", "type text", [{ name: "text", type: "String" }]),
  unit("set_mouse_scroll", "set mouse scroll", [
    { name: "direction", type: "i32" },
    { name: "amount", type: "i32" },
  ]),
];

/**
 * napi-rs exposes snake_case Rust names to JS in camelCase.
 */
export function toJsName(rustName: string): string {
  return rustName.replace(/_([a-z])/g, (_m, c: string) => c.toUpperCase());
}
