import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  CallToolResult,
  ListToolsRequestSchema,
  Tool,
} from '@modelcontextprotocol/sdk/types.js';
import {
  CommandOutputSchema,
  CommandResultOutputSchema,
  ConnectDeviceInputSchema,
  ConnectDeviceOutputSchema,
  ConnectDeviceToolSchema,
  DeviceOnlyInputSchema,
  DeviceOnlyToolSchema,
  DumpUiInputSchema,
  DumpUiOutputSchema,
  DumpUiToolSchema,
  FocusedWindowOutputSchema,
  InputTextInputSchema,
  InputTextOutputSchema,
  InputTextToolSchema,
  InstallApkInputSchema,
  InstallApkToolSchema,
  LaunchAppInputSchema,
  LaunchAppToolSchema,
  ListActivitiesInputSchema,
  ListActivitiesOutputSchema,
  ListActivitiesToolSchema,
  ListPackagesOutputSchema,
  PressKeysInputSchema,
  PressKeysOutputSchema,
  PressKeysToolSchema,
  RunAdbCommandInputSchema,
  RunAdbCommandToolSchema,
  RunShellInputSchema,
  RunShellToolSchema,
  ScreenshotOutputSchema,
  UninstallAppInputSchema,
  UninstallAppToolSchema,
  WakeupOutputSchema,
} from './types';
import { AdbSession } from './utils/adb';
import { tokenizeCommand } from './utils/command';
import { formatErrorForResponse, getErrorSuggestion, isRecoverableError } from './utils/error';
import { formatHierarchy } from './utils/hierarchy';
import { Logger, noopLogger } from './utils/logger';
import { binaryToBase64 } from './utils/screenshot';

export const SERVER_NAME = 'adb-session-mcp';

export interface AdbMcpServerOptions {
  version?: string;
  logger?: Logger;
}

function jsonResult(result: unknown): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(result),
      },
    ],
  };
}

const TOOLS: Tool[] = [
  {
    name: 'connect_android_device',
    description: 'Connect adb to a device over TCP/IP; the first connection becomes the default device',
    inputSchema: ConnectDeviceToolSchema,
  },
  {
    name: 'run_adb_command',
    description: 'Run an arbitrary adb command against the target device',
    inputSchema: RunAdbCommandToolSchema,
  },
  {
    name: 'run_android_shell',
    description: 'Run a command in the Android device shell',
    inputSchema: RunShellToolSchema,
  },
  {
    name: 'get_adb_version',
    description: 'Report the version of the adb binary in use',
    inputSchema: DeviceOnlyToolSchema,
  },
  {
    name: 'wait_for_android_device',
    description: 'Block until the target device is online',
    inputSchema: DeviceOnlyToolSchema,
  },
  {
    name: 'reboot_android_device',
    description: 'Reboot the target Android device',
    inputSchema: DeviceOnlyToolSchema,
  },
  {
    name: 'list_android_packages',
    description: 'List installed package names on the device',
    inputSchema: DeviceOnlyToolSchema,
  },
  {
    name: 'list_android_activities',
    description: 'List exported activities of an installed package',
    inputSchema: ListActivitiesToolSchema,
  },
  {
    name: 'get_android_focused_window',
    description: 'Get the package and activity of the focused window',
    inputSchema: DeviceOnlyToolSchema,
  },
  {
    name: 'dump_android_ui_hierarchy',
    description: 'Dump the current UI hierarchy as a parsed tree or indented XML',
    inputSchema: DumpUiToolSchema,
  },
  {
    name: 'launch_android_app',
    description: 'Launch an app by package name, optionally at a specific activity',
    inputSchema: LaunchAppToolSchema,
  },
  {
    name: 'wake_android_device',
    description: 'Turn the device screen on if it is off',
    inputSchema: DeviceOnlyToolSchema,
  },
  {
    name: 'press_android_keys',
    description: 'Send one key event made of the named keys (HOME, BACK, ENTER, ...)',
    inputSchema: PressKeysToolSchema,
  },
  {
    name: 'input_android_text',
    description: 'Type text into the focused field',
    inputSchema: InputTextToolSchema,
  },
  {
    name: 'install_android_apk',
    description: 'Install an APK from the host on the device',
    inputSchema: InstallApkToolSchema,
  },
  {
    name: 'uninstall_android_app',
    description: 'Uninstall an Android app by package name',
    inputSchema: UninstallAppToolSchema,
  },
  {
    name: 'take_android_screenshot',
    description: 'Capture a screenshot from the Android device',
    inputSchema: DeviceOnlyToolSchema,
  },
];

class AdbMcpServer {
  private server: Server;
  private session: AdbSession;
  private logger: Logger;

  constructor(session: AdbSession, options: AdbMcpServerOptions = {}) {
    this.session = session;
    this.logger = options.logger ?? noopLogger;
    this.server = new Server(
      {
        name: SERVER_NAME,
        version: options.version ?? '0.0.0',
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupToolHandlers();
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

    this.server.setRequestHandler(CallToolRequestSchema, async request => {
      const { name, arguments: args } = request.params;

      try {
        return await this.callTool(name, args ?? {});
      } catch (error) {
        const message = formatErrorForResponse(error);
        const context = {
          error: error instanceof Error ? error.message : String(error),
          suggestion: getErrorSuggestion(error),
        };
        if (isRecoverableError(error)) {
          this.logger.warn(`Tool ${name} failed`, context);
        } else {
          this.logger.error(`Tool ${name} failed`, context);
        }
        return {
          content: [
            {
              type: 'text',
              text: message,
            },
          ],
          isError: true,
        };
      }
    });
  }

  private target(deviceId?: string): string | undefined {
    return deviceId ?? this.session.defaultDevice;
  }

  private async callTool(name: string, args: Record<string, unknown>): Promise<CallToolResult> {
    switch (name) {
      case 'connect_android_device': {
        const input = ConnectDeviceInputSchema.parse(args);
        const deviceId = await this.session.connect(input.address);
        return jsonResult(
          ConnectDeviceOutputSchema.parse({ deviceId, defaultDevice: this.session.defaultDevice })
        );
      }

      case 'run_adb_command': {
        const input = RunAdbCommandInputSchema.parse(args);
        const result = await this.session.exec(input.args, {
          device: input.deviceId,
          filter: input.filter,
          timeoutMs: input.timeoutMs,
        });
        return jsonResult(
          CommandResultOutputSchema.parse({ deviceId: this.target(input.deviceId), ...result })
        );
      }

      case 'run_android_shell': {
        const input = RunShellInputSchema.parse(args);
        const result = await this.session.exec(['shell', ...tokenizeCommand(input.command)], {
          device: input.deviceId,
          filter: input.filter,
          timeoutMs: input.timeoutMs,
        });
        return jsonResult(
          CommandResultOutputSchema.parse({ deviceId: this.target(input.deviceId), ...result })
        );
      }

      case 'get_adb_version': {
        const output = await this.session.version();
        return jsonResult(CommandOutputSchema.parse({ output }));
      }

      case 'wait_for_android_device': {
        const input = DeviceOnlyInputSchema.parse(args);
        const output = await this.session.waitForDevice(input.deviceId);
        return jsonResult(CommandOutputSchema.parse({ deviceId: this.target(input.deviceId), output }));
      }

      case 'reboot_android_device': {
        const input = DeviceOnlyInputSchema.parse(args);
        const output = await this.session.reboot(input.deviceId);
        return jsonResult(CommandOutputSchema.parse({ deviceId: this.target(input.deviceId), output }));
      }

      case 'list_android_packages': {
        const input = DeviceOnlyInputSchema.parse(args);
        const packages = await this.session.listInstalledPackages(input.deviceId);
        return jsonResult(
          ListPackagesOutputSchema.parse({ deviceId: this.target(input.deviceId), packages })
        );
      }

      case 'list_android_activities': {
        const input = ListActivitiesInputSchema.parse(args);
        const activities = await this.session.listPackageActivities(
          input.packageName,
          input.deviceId
        );
        return jsonResult(
          ListActivitiesOutputSchema.parse({
            deviceId: this.target(input.deviceId),
            packageName: input.packageName,
            activities,
          })
        );
      }

      case 'get_android_focused_window': {
        const input = DeviceOnlyInputSchema.parse(args);
        const focused = await this.session.getFocusedWindow(input.deviceId);
        return jsonResult(
          FocusedWindowOutputSchema.parse({
            deviceId: this.target(input.deviceId),
            ...focused,
            component: `${focused.packageName}/${focused.activity}`,
          })
        );
      }

      case 'dump_android_ui_hierarchy': {
        const input = DumpUiInputSchema.parse(args);
        const hierarchy = await this.session.getViewHierarchy(input.deviceId);
        return jsonResult(
          DumpUiOutputSchema.parse(
            input.pretty
              ? { deviceId: this.target(input.deviceId), xml: formatHierarchy(hierarchy) }
              : { deviceId: this.target(input.deviceId), hierarchy }
          )
        );
      }

      case 'launch_android_app': {
        const input = LaunchAppInputSchema.parse(args);
        const output = await this.session.launch(input.packageName, input.activity, input.deviceId);
        return jsonResult(CommandOutputSchema.parse({ deviceId: this.target(input.deviceId), output }));
      }

      case 'wake_android_device': {
        const input = DeviceOnlyInputSchema.parse(args);
        await this.session.wakeup(input.deviceId);
        return jsonResult(WakeupOutputSchema.parse({ deviceId: this.target(input.deviceId), awake: true }));
      }

      case 'press_android_keys': {
        const input = PressKeysInputSchema.parse(args);
        const keys = await this.session.pressKey(input.keys, input.waitMs, input.deviceId);
        return jsonResult(PressKeysOutputSchema.parse({ deviceId: this.target(input.deviceId), keys }));
      }

      case 'input_android_text': {
        const input = InputTextInputSchema.parse(args);
        await this.session.inputText(input.text, input.waitMs, input.deviceId);
        return jsonResult(
          InputTextOutputSchema.parse({ deviceId: this.target(input.deviceId), text: input.text })
        );
      }

      case 'install_android_apk': {
        const input = InstallApkInputSchema.parse(args);
        const output = await this.session.install(input.apkPath, input.flags, input.deviceId);
        return jsonResult(CommandOutputSchema.parse({ deviceId: this.target(input.deviceId), output }));
      }

      case 'uninstall_android_app': {
        const input = UninstallAppInputSchema.parse(args);
        const output = await this.session.uninstall(input.packageName, input.flags, input.deviceId);
        return jsonResult(CommandOutputSchema.parse({ deviceId: this.target(input.deviceId), output }));
      }

      case 'take_android_screenshot': {
        const input = DeviceOnlyInputSchema.parse(args);
        const screenshot = await this.session.screenshot(input.deviceId);
        const summary = ScreenshotOutputSchema.parse({
          deviceId: this.target(input.deviceId),
          width: screenshot.width,
          height: screenshot.height,
          channels: screenshot.channels,
          timestamp: Date.now(),
        });
        return {
          content: [
            {
              type: 'image',
              data: binaryToBase64(screenshot.png),
              mimeType: 'image/png',
            },
            {
              type: 'text',
              text: JSON.stringify(summary),
            },
          ],
        };
      }

      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  async run(): Promise<void> {
    await this.connect(new StdioServerTransport());
    this.logger.info('adb session MCP server started');
  }
}

// Export the server class
export { AdbMcpServer };
