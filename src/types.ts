import { z } from 'zod';

// Command input accepted at every API boundary: a single string split with
// shell-lexing rules, or a pre-tokenized argument list
export type CommandInput = string | readonly string[];

// Result of one external process execution
export interface CommandResult {
  exitCode: number | null;
  output: string; // stderr (if any) followed by stdout, trimmed and optionally filtered
  timedOut: boolean;
}

export type LineFilter = RegExp | string;

export type ScreenState = 'on' | 'off' | 'unknown';

export interface FocusedWindow {
  packageName: string;
  activity: string;
}

export interface HierarchyNode {
  tag: string;
  attributes: Record<string, string>;
  children: HierarchyNode[];
}

export interface DecodedScreenshot {
  png: Buffer;
  pixels: Buffer; // raw interleaved pixel data
  width: number;
  height: number;
  channels: number;
}

// Error handling interfaces
export interface ADBError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  suggestion?: string;
}

export class ADBCommandError extends Error implements ADBError {
  code: string;
  details?: Record<string, unknown>;
  suggestion?: string;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message);
    this.name = 'ADBCommandError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
  }
}

export class BinaryNotFoundError extends ADBCommandError {
  constructor(binaryName: string) {
    super(
      'BINARY_NOT_FOUND',
      `Binary not found in path: "${binaryName}"`,
      { binaryName },
      'Please install Android SDK Platform Tools and ensure ADB is in your PATH'
    );
    this.name = 'BinaryNotFoundError';
  }
}

export class InvalidArgumentError extends ADBCommandError {
  constructor(message: string, value?: unknown) {
    super('INVALID_ARGUMENT', message, value === undefined ? undefined : { value });
    this.name = 'InvalidArgumentError';
  }
}

export class ConnectionError extends ADBCommandError {
  constructor(output: string, address?: string) {
    super(
      'CONNECTION_FAILED',
      address ? `Failed to connect to '${address}': ${output}` : `Failed to connect: ${output}`,
      { address, output },
      'Check that the device is reachable and that adb over TCP/IP is enabled on it'
    );
    this.name = 'ConnectionError';
  }
}

export class WindowNotFoundError extends ADBCommandError {
  constructor(raw: string) {
    super(
      'WINDOW_NOT_FOUND',
      'Current window focus could not be found in dumpsys',
      { raw },
      'Make sure the device is unlocked and an app is in the foreground'
    );
    this.name = 'WindowNotFoundError';
  }
}

export class ApplicationErrorError extends ADBCommandError {
  constructor(raw: string) {
    super('APPLICATION_ERROR', 'Application error', { raw }, 'Dismiss the crash dialog on the device');
    this.name = 'ApplicationErrorError';
  }
}

export class ApplicationNotRespondingError extends ADBCommandError {
  constructor(raw: string) {
    super(
      'APPLICATION_NOT_RESPONDING',
      'Application not responding',
      { raw },
      'Wait for the app or close the ANR dialog on the device'
    );
    this.name = 'ApplicationNotRespondingError';
  }
}

export class WakeupFailedError extends ADBCommandError {
  constructor(raw: string) {
    super(
      'WAKEUP_FAILED',
      'Current screen state could not be found in dumpsys',
      { raw },
      'Unlock the device manually or check that it reports its power state'
    );
    this.name = 'WakeupFailedError';
  }
}

export class UnknownKeyError extends ADBCommandError {
  constructor(keys: string[]) {
    super(
      'UNKNOWN_KEY',
      `Provided key ${JSON.stringify(keys)} does not have a mapping`,
      { keys },
      'Use one of the names listed in KEY_CODES'
    );
    this.name = 'UnknownKeyError';
  }
}

export class MalformedHierarchyError extends ADBCommandError {
  constructor(reason: string, raw: string) {
    super('MALFORMED_HIERARCHY', `UI hierarchy could not be parsed: ${reason}`, {
      reason,
      length: raw.length,
    });
    this.name = 'MalformedHierarchyError';
  }
}

export class ScreenshotCaptureError extends ADBCommandError {
  constructor(deviceId: string, originalError?: Error) {
    super(
      'SCREENSHOT_CAPTURE_FAILED',
      `Failed to capture screenshot from device '${deviceId}'`,
      { deviceId, originalError: originalError?.message },
      'Please ensure the device is connected and screen is unlocked'
    );
    this.name = 'ScreenshotCaptureError';
  }
}

// Tool input schemas
const deviceIdField = z
  .string()
  .min(1)
  .optional()
  .describe('Optional device ID. If not provided, uses the session default device.');

const commandField = z
  .union([z.string(), z.array(z.string())])
  .describe('Command as a single string (shell quoting honored) or a list of arguments.');

export const ConnectDeviceInputSchema = z.object({
  address: z
    .string()
    .min(1)
    .optional()
    .describe('Device address to connect to (e.g., 192.168.1.20:5555).'),
});

export const RunAdbCommandInputSchema = z.object({
  deviceId: deviceIdField,
  args: commandField,
  filter: z.string().optional().describe('Optional regular expression; only matching lines are returned.'),
  timeoutMs: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Optional timeout in milliseconds for the command.'),
});

export const RunShellInputSchema = z.object({
  deviceId: deviceIdField,
  command: commandField,
  filter: z.string().optional().describe('Optional regular expression; only matching lines are returned.'),
  timeoutMs: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Optional timeout in milliseconds for the command.'),
});

export const DeviceOnlyInputSchema = z.object({
  deviceId: deviceIdField,
});

export const ListActivitiesInputSchema = z.object({
  deviceId: deviceIdField,
  packageName: z.string().min(1).describe('Android application package name (e.g., com.example.app)'),
});

export const DumpUiInputSchema = z.object({
  deviceId: deviceIdField,
  pretty: z
    .boolean()
    .default(false)
    .describe('Return indented XML with normalized whitespace instead of the parsed tree.'),
});

export const LaunchAppInputSchema = z.object({
  deviceId: deviceIdField,
  packageName: z.string().min(1).describe('Android application package name (e.g., com.example.app)'),
  activity: z
    .string()
    .min(1)
    .optional()
    .describe('Optional activity to launch (e.g., .MainActivity). Omit to use the launcher intent.'),
});

export const PressKeysInputSchema = z.object({
  deviceId: deviceIdField,
  keys: commandField.describe('Key names (e.g., HOME, BACK, ENTER) sent as one key event.'),
  waitMs: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe('Milliseconds to wait after sending the keys.'),
});

export const InputTextInputSchema = z.object({
  deviceId: deviceIdField,
  text: z.string().min(1).describe('Text to input into the focused field.'),
  waitMs: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe('Milliseconds to wait after sending the text.'),
});

export const InstallApkInputSchema = z.object({
  deviceId: deviceIdField,
  apkPath: z.string().min(1).describe('Path to the APK on the host.'),
  flags: z
    .string()
    .regex(/^[a-zA-Z]*$/)
    .default('r')
    .describe('Install flags without the leading dash (default "r" to reinstall).'),
});

export const UninstallAppInputSchema = z.object({
  deviceId: deviceIdField,
  packageName: z.string().min(1).describe('Android application package name (e.g., com.example.app)'),
  flags: z
    .string()
    .regex(/^[a-zA-Z]*$/)
    .optional()
    .describe('Uninstall flags without the leading dash (e.g., "k" to keep data).'),
});

// Tool output schemas
export const ConnectDeviceOutputSchema = z.object({
  deviceId: z.string(),
  defaultDevice: z.string().optional(),
});

export const CommandOutputSchema = z.object({
  deviceId: z.string().optional(),
  output: z.string(),
});

export const CommandResultOutputSchema = z.object({
  deviceId: z.string().optional(),
  exitCode: z.number().nullable(),
  output: z.string(),
  timedOut: z.boolean(),
});

export const ListPackagesOutputSchema = z.object({
  deviceId: z.string().optional(),
  packages: z.array(z.string()),
});

export const ListActivitiesOutputSchema = z.object({
  deviceId: z.string().optional(),
  packageName: z.string(),
  activities: z.array(z.string()),
});

export const FocusedWindowOutputSchema = z.object({
  deviceId: z.string().optional(),
  packageName: z.string(),
  activity: z.string(),
  component: z.string(),
});

const HierarchyNodeSchema: z.ZodType<HierarchyNode> = z.lazy(() =>
  z.object({
    tag: z.string(),
    attributes: z.record(z.string()),
    children: z.array(HierarchyNodeSchema),
  })
);

export const DumpUiOutputSchema = z.object({
  deviceId: z.string().optional(),
  hierarchy: HierarchyNodeSchema.optional(),
  xml: z.string().optional(),
});

export const WakeupOutputSchema = z.object({
  deviceId: z.string().optional(),
  awake: z.boolean(),
});

export const PressKeysOutputSchema = z.object({
  deviceId: z.string().optional(),
  keys: z.array(z.string()),
});

export const InputTextOutputSchema = z.object({
  deviceId: z.string().optional(),
  text: z.string(),
});

export const ScreenshotOutputSchema = z.object({
  deviceId: z.string().optional(),
  width: z.number(),
  height: z.number(),
  channels: z.number(),
  timestamp: z.number(),
});

// Type exports
export type ConnectDeviceInput = z.infer<typeof ConnectDeviceInputSchema>;
export type RunAdbCommandInput = z.infer<typeof RunAdbCommandInputSchema>;
export type RunShellInput = z.infer<typeof RunShellInputSchema>;
export type DeviceOnlyInput = z.infer<typeof DeviceOnlyInputSchema>;
export type ListActivitiesInput = z.infer<typeof ListActivitiesInputSchema>;
export type DumpUiInput = z.infer<typeof DumpUiInputSchema>;
export type LaunchAppInput = z.infer<typeof LaunchAppInputSchema>;
export type PressKeysInput = z.infer<typeof PressKeysInputSchema>;
export type InputTextInput = z.infer<typeof InputTextInputSchema>;
export type InstallApkInput = z.infer<typeof InstallApkInputSchema>;
export type UninstallAppInput = z.infer<typeof UninstallAppInputSchema>;

// JSON schemas advertised through tools/list
const deviceIdProperty = {
  type: 'string' as const,
  description: 'Optional device ID. If not provided, uses the session default device.',
};

const commandProperty = {
  oneOf: [{ type: 'string' as const }, { type: 'array' as const, items: { type: 'string' as const } }],
};

export const ConnectDeviceToolSchema = {
  type: 'object' as const,
  properties: {
    address: {
      type: 'string' as const,
      description: 'Device address to connect to (e.g., 192.168.1.20:5555).',
    },
  },
  required: [] as string[],
};

export const RunAdbCommandToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: deviceIdProperty,
    args: {
      ...commandProperty,
      description: 'adb arguments as a single string (shell quoting honored) or a list.',
    },
    filter: {
      type: 'string' as const,
      description: 'Optional regular expression; only matching lines are returned.',
    },
    timeoutMs: {
      type: 'number' as const,
      description: 'Optional timeout in milliseconds for the command.',
    },
  },
  required: ['args'] as string[],
};

export const RunShellToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: deviceIdProperty,
    command: {
      ...commandProperty,
      description: 'Device shell command as a single string or a list of arguments.',
    },
    filter: {
      type: 'string' as const,
      description: 'Optional regular expression; only matching lines are returned.',
    },
    timeoutMs: {
      type: 'number' as const,
      description: 'Optional timeout in milliseconds for the command.',
    },
  },
  required: ['command'] as string[],
};

export const DeviceOnlyToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: deviceIdProperty,
  },
  required: [] as string[],
};

export const ListActivitiesToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: deviceIdProperty,
    packageName: {
      type: 'string' as const,
      description: 'Android application package name (e.g., com.example.app).',
    },
  },
  required: ['packageName'] as string[],
};

export const DumpUiToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: deviceIdProperty,
    pretty: {
      type: 'boolean' as const,
      description: 'Return indented XML with normalized whitespace instead of the parsed tree.',
      default: false,
    },
  },
  required: [] as string[],
};

export const LaunchAppToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: deviceIdProperty,
    packageName: {
      type: 'string' as const,
      description: 'Android application package name (e.g., com.example.app).',
    },
    activity: {
      type: 'string' as const,
      description: 'Optional activity to launch (e.g., .MainActivity). Omit to use the launcher intent.',
    },
  },
  required: ['packageName'] as string[],
};

export const PressKeysToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: deviceIdProperty,
    keys: {
      ...commandProperty,
      description: 'Key names (e.g., HOME, BACK, ENTER) sent as one key event.',
    },
    waitMs: {
      type: 'number' as const,
      description: 'Milliseconds to wait after sending the keys.',
    },
  },
  required: ['keys'] as string[],
};

export const InputTextToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: deviceIdProperty,
    text: {
      type: 'string' as const,
      description: 'Text to input into the focused field.',
    },
    waitMs: {
      type: 'number' as const,
      description: 'Milliseconds to wait after sending the text.',
    },
  },
  required: ['text'] as string[],
};

export const InstallApkToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: deviceIdProperty,
    apkPath: {
      type: 'string' as const,
      description: 'Path to the APK on the host.',
    },
    flags: {
      type: 'string' as const,
      description: 'Install flags without the leading dash (default "r" to reinstall).',
      default: 'r',
    },
  },
  required: ['apkPath'] as string[],
};

export const UninstallAppToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: deviceIdProperty,
    packageName: {
      type: 'string' as const,
      description: 'Android application package name (e.g., com.example.app).',
    },
    flags: {
      type: 'string' as const,
      description: 'Uninstall flags without the leading dash (e.g., "k" to keep data).',
    },
  },
  required: ['packageName'] as string[],
};
