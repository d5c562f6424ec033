import {
  ApplicationErrorError,
  ApplicationNotRespondingError,
  FocusedWindow,
  ScreenState,
  WindowNotFoundError,
} from '../types';

export const FOCUS_FILTER = /mCurrentFocus|mFocusedApp/;
export const SCREEN_STATE_FILTER = /mScreenOn=|Display Power: state=|mWakefulness=/;

const SCREEN_ON_MARKERS = [/mScreenOn=true/, /Display Power: state=ON\b/, /mWakefulness=Awake/];
const SCREEN_OFF_MARKERS = [
  /mScreenOn=false/,
  /Display Power: state=(?:OFF|DOZE)/,
  /mWakefulness=(?:Asleep|Dozing)/,
];

const COMPONENT_TOKEN = /[\w.]+\/[\w.$]+/;
const UI_DUMP_FOOTER = /\s*UI hier\w* dumped to:.*$/s;

function splitLines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// `pm list packages -f` prints package:<apk path>=<package name>
export function parseInstalledPackages(output: string): string[] {
  const packages: string[] = [];
  for (const line of output.split(/\r?\n/)) {
    const parts = line.split('=');
    if (parts.length === 2 && parts[1].trim().length > 0) {
      packages.push(parts[1].trim());
    }
  }
  return packages;
}

/**
 * Pulls exported activities out of `dumpsys package <name>`: intent filter
 * table rows of the form `1a2b3c4d com.example/.Main filter 5e6f7a8b`.
 * Only short names relative to the package (`.Main`) are kept, once each.
 */
export function parseActivitiesFromDumpsys(output: string, packageName: string): string[] {
  const pattern = new RegExp(
    `[0-9a-fA-F]{8} ${escapeRegex(packageName)}/([.\\w]+) filter [0-9a-fA-F]{8}`,
    'g'
  );
  const seen = new Set<string>();
  for (const match of output.matchAll(pattern)) {
    const activity = match[1];
    if (!seen.has(activity) && activity.split('.').length === 2) {
      seen.add(activity);
    }
  }
  return [...seen];
}

export function parseFocusedWindow(output: string): FocusedWindow {
  const lines = splitLines(output);
  const focusLine = lines.find(line => line.includes('mCurrentFocus')) ?? '';
  const appLine = lines.find(line => line.includes('mFocusedApp')) ?? '';

  if (focusLine.includes('Application Error')) {
    throw new ApplicationErrorError(focusLine);
  }
  if (focusLine.includes('Application Not Responding')) {
    throw new ApplicationNotRespondingError(focusLine);
  }

  const token = appLine.match(COMPONENT_TOKEN)?.[0] ?? focusLine.match(COMPONENT_TOKEN)?.[0];
  if (!token) {
    throw new WindowNotFoundError(lines.join('\n'));
  }

  const separator = token.indexOf('/');
  return {
    packageName: token.slice(0, separator),
    activity: token.slice(separator + 1),
  };
}

export function parseScreenState(output: string): ScreenState {
  if (SCREEN_OFF_MARKERS.some(marker => marker.test(output))) {
    return 'off';
  }
  if (SCREEN_ON_MARKERS.some(marker => marker.test(output))) {
    return 'on';
  }
  return 'unknown';
}

// uiautomator appends a confirmation line (misspelled on most releases)
export function stripUiDumpFooter(output: string): string {
  return output.replace(UI_DUMP_FOOTER, '').trim();
}
