import { UnknownKeyError } from '../types';

// https://developer.android.com/reference/android/view/KeyEvent
export const KEY_CODES: Readonly<Record<string, number>> = Object.freeze({
  HOME: 3,
  BACK: 4,
  UP: 19,
  DOWN: 20,
  LEFT: 21,
  RIGHT: 22,
  CENTER: 23,
  VOLUME_UP: 24,
  VOLUME_DOWN: 25,
  POWER: 26,
  CAMERA: 27,
  A: 29,
  C: 31,
  V: 50,
  X: 52,
  TAB: 61,
  SPACE: 62,
  ENTER: 66,
  BACKSPACE: 67,
  MENU: 82,
  SEARCH: 84,
  PAGE_UP: 92,
  PAGE_DOWN: 93,
  ESC: 111,
  DEL: 112,
  CTRL: 113,
  MOVE_HOME: 122,
  END: 123,
  APP_SWITCH: 187,
  SLEEP: 223,
  WAKEUP: 224,
});

/**
 * Maps key names (case-insensitive) to key codes. Throws UnknownKeyError
 * naming every requested key when any of them has no mapping.
 */
export function resolveKeyCodes(names: string[]): number[] {
  const upper = names.map(name => name.toUpperCase());
  const codes: number[] = [];
  for (const name of upper) {
    const code = Object.prototype.hasOwnProperty.call(KEY_CODES, name) ? KEY_CODES[name] : undefined;
    if (code === undefined) {
      throw new UnknownKeyError(upper);
    }
    codes.push(code);
  }
  return codes;
}
