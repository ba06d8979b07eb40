/**
 * desktop-repack Engine — Stub Binding (Barrel Export)
 */

export {
  UnsupportedNativeCapabilities,
  keyboardKeyCode,
  KEYBOARD_KEYS,
  MouseButton,
  ScrollDirection,
  RequestAccessibilityOptions,
  STUB_MONITOR,
  STUB_MOUSE_POSITION,
  STUB_ACTIVE_WINDOW_HANDLE,
  type NativeCapabilities,
  type InputEmulator,
  type MonitorInfo,
  type MousePosition,
  type WindowInfo,
} from "./capabilities";

export {
  BINDING_ENUMS,
  BINDING_STRUCTS,
  BINDING_FUNCTIONS,
  INPUT_EMULATOR_CLASS,
  INPUT_EMULATOR_METHODS,
  toJsName,
  type BindingOperation,
  type BindingEnum,
  type BindingStruct,
  type RustType,
  type StubValue,
} from "./surface";

export {
  renderBindingProject,
  renderCargoToml,
  renderLibRs,
  renderPackageJson,
  renderRustValue,
  renderLogFormat,
  writeProjectFiles,
  type ProjectFiles,
} from "./emitter";

export {
  BindingBuilder,
  NapiStubBuilder,
  PrebuiltBinding,
  createBindingBuilder,
} from "./builder";
