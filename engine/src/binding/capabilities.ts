/**
 * desktop-repack Engine — Native Capability Surface
 *
 * The packed app loads a native binding for window enumeration, input
 * emulation, clipboard shortcuts and monitor queries. On Linux none of this
 * is implemented: the repack ships a binding whose every operation logs its
 * call and returns a fixed value. Disabling these features is the intended
 * behaviour of the Linux build.
 *
 * `UnsupportedNativeCapabilities` is that behaviour in TypeScript. The Rust
 * stub rendered by emitter.ts returns the same values (both read them from
 * the constants below).
 */

import keyboardKeys from "../../data/keyboard-keys.json";
import { Logger } from "../utils/logger";

// ─── Shapes (field names as napi-rs exposes them to JS) ──────────

export type MousePosition = {
  x: number;
  y: number;
};

export type MonitorInfo = {
  x: number;
  y: number;
  width: number;
  height: number;
  monitorName: string;
  isPrimary: boolean;
};

export type WindowInfo = {
  handle: number;
  processId: number;
  executablePath: string;
  title: string;
  x: number;
  y: number;
  width: number;
  height: number;
};

// ─── Enumerations ────────────────────────────────────────────────

export const ScrollDirection = { Down: 0, Up: 1 } as const;
export type ScrollDirection =
  (typeof ScrollDirection)[keyof typeof ScrollDirection];

export const MouseButton = { Left: 0, Middle: 1, Right: 2 } as const;
export type MouseButton = (typeof MouseButton)[keyof typeof MouseButton];

export const RequestAccessibilityOptions = {
  ShowDialog: 0,
  OnlyRegisterInSettings: 1,
} as const;
export type RequestAccessibilityOptions =
  (typeof RequestAccessibilityOptions)[keyof typeof RequestAccessibilityOptions];

/** Variant names of the KeyboardKey enum, in discriminant order */
export const KEYBOARD_KEYS: readonly string[] = keyboardKeys;

/**
 * Discriminant of a KeyboardKey variant, or -1 for an unknown name.
 */
export function keyboardKeyCode(name: string): number {
  return KEYBOARD_KEYS.indexOf(name);
}

// ─── Stub Values ─────────────────────────────────────────────────

export const STUB_MONITOR: MonitorInfo = {
  x: 0,
  y: 0,
  width: 1920,
  height: 1080,
  monitorName: "\\\\.\\DISPLAY1",
  isPrimary: true,
};

export const STUB_MOUSE_POSITION: MousePosition = { x: 0, y: 0 };

export const STUB_ACTIVE_WINDOW_HANDLE = 0;

// ─── Capability Interfaces ───────────────────────────────────────

export interface InputEmulator {
  copy(): void;
  cut(): void;
  paste(): void;
  undo(): void;
  selectAll(): void;
  /** Key codes currently held down */
  held(): number[];
  pressChars(text: string): void;
  pressKey(key: number[]): void;
  pressThenReleaseKey(key: number[]): void;
  releaseChars(text: string): void;
  releaseKey(key: number): void;
  setButtonClick(button: number): void;
  setButtonToggle(button: number): void;
  getMousePosition(): MousePosition;
  typeText(text: string): void;
  setMouseScroll(direction: number, amount: number): void;
}

export interface NativeCapabilities {
  /** False for the "not implemented on this platform" variant */
  readonly supported: boolean;
  requestAccessibility(options: number): boolean;
  getWindowInfo(): WindowInfo[];
  getActiveWindowHandle(): number;
  getMonitorInfo(): MonitorInfo;
  focusWindow(handle: number): void;
  createInputEmulator(): InputEmulator;
}

// ─── Unsupported Variant ─────────────────────────────────────────

class UnsupportedInputEmulator implements InputEmulator {
  constructor(private readonly log: (call: string, args?: unknown[]) => void) {}

  copy(): void {
    this.log("InputEmulator.copy");
  }

  cut(): void {
    this.log("InputEmulator.cut");
  }

  paste(): void {
    this.log("InputEmulator.paste");
  }

  undo(): void {
    this.log("InputEmulator.undo");
  }

  selectAll(): void {
    this.log("InputEmulator.selectAll");
  }

  held(): number[] {
    this.log("InputEmulator.held");
    return [];
  }

  pressChars(text: string): void {
    this.log("InputEmulator.pressChars", [text]);
  }

  pressKey(key: number[]): void {
    this.log("InputEmulator.pressKey", [key]);
  }

  pressThenReleaseKey(key: number[]): void {
    this.log("InputEmulator.pressThenReleaseKey", [key]);
  }

  releaseChars(text: string): void {
    this.log("InputEmulator.releaseChars", [text]);
  }

  releaseKey(key: number): void {
    this.log("InputEmulator.releaseKey", [key]);
  }

  setButtonClick(button: number): void {
    this.log("InputEmulator.setButtonClick", [button]);
  }

  setButtonToggle(button: number): void {
    this.log("InputEmulator.setButtonToggle", [button]);
  }

  getMousePosition(): MousePosition {
    this.log("InputEmulator.getMousePosition");
    return { ...STUB_MOUSE_POSITION };
  }

  typeText(text: string): void {
    this.log("InputEmulator.typeText", [text]);
  }

  setMouseScroll(direction: number, amount: number): void {
    this.log("InputEmulator.setMouseScroll", [direction, amount]);
  }
}

export class UnsupportedNativeCapabilities implements NativeCapabilities {
  readonly supported = false;

  constructor(private readonly logger: Logger) {}

  private readonly log = (call: string, args: unknown[] = []): void => {
    this.logger.info({ call, args }, "Native call (unsupported on Linux)");
  };

  requestAccessibility(options: number): boolean {
    this.log("requestAccessibility", [options]);
    return true;
  }

  getWindowInfo(): WindowInfo[] {
    this.log("getWindowInfo");
    return [];
  }

  getActiveWindowHandle(): number {
    this.log("getActiveWindowHandle");
    return STUB_ACTIVE_WINDOW_HANDLE;
  }

  getMonitorInfo(): MonitorInfo {
    this.log("getMonitorInfo");
    return { ...STUB_MONITOR };
  }

  focusWindow(handle: number): void {
    this.log("focusWindow", [handle]);
  }

  createInputEmulator(): InputEmulator {
    return new UnsupportedInputEmulator(this.log);
  }
}
