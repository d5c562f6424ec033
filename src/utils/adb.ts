import { randomUUID } from 'crypto';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { setTimeout as delay } from 'timers/promises';
import {
  CommandInput,
  CommandResult,
  ConnectionError,
  DecodedScreenshot,
  FocusedWindow,
  HierarchyNode,
  InvalidArgumentError,
  LineFilter,
  ScreenshotCaptureError,
  WakeupFailedError,
} from '../types';
import { escapeShellArg, tokenizeCommand } from './command';
import {
  FOCUS_FILTER,
  SCREEN_STATE_FILTER,
  parseActivitiesFromDumpsys,
  parseFocusedWindow,
  parseInstalledPackages,
  parseScreenState,
  stripUiDumpFooter,
} from './dumpsys';
import { parseHierarchy } from './hierarchy';
import { resolveKeyCodes } from './keycodes';
import { ProcessRunner, ProcessRunnerOptions } from './process-runner';
import { decodeScreenshot } from './screenshot';
import { BridgeServerControl, BridgeServerGuard } from './server-guard';

const DEFAULT_BINARY = 'adb';
const CONNECTED_MARKER = 'connected to ';
const ALREADY_CONNECTED_MARKER = 'already connected';
const CONNECT_SETTLE_MS = 1000;
const WAKEUP_SETTLE_MS = 500;
const KEY_WAIT_MS = 500;
const DEVICE_TMP_DIR = '/sdcard';
const LAUNCHER_CATEGORY = 'android.intent.category.LAUNCHER';

export interface AdbSessionOptions extends ProcessRunnerOptions {
  // Executable name or command; resolved on PATH
  binary?: CommandInput;
  // Prebuilt runner; binary and the runner options are ignored when given
  runner?: ProcessRunner;
  serverGuard?: BridgeServerGuard;
  // Per-call timeout applied when a call does not pass its own
  timeoutMs?: number;
  connectSettleMs?: number;
  wakeupSettleMs?: number;
  keyWaitMs?: number;
}

export interface CommandOptions {
  filter?: LineFilter;
  device?: string;
  timeoutMs?: number;
}

// `am start -n` component for an activity given as `.Main`, `Main` or fully qualified
export function toComponentName(packageName: string, activity: string): string {
  return activity.includes('.') ? `${packageName}/${activity}` : `${packageName}/.${activity}`;
}

/**
 * A device-targeting context over one adb {@link ProcessRunner}.
 *
 * The first successful {@link connect} pins a default device; later calls
 * without an explicit device are sent with `-s <default>`. Higher-level
 * operations return the tool's text output or a parsed value and throw typed
 * errors only when the expected marker is missing from that output.
 */
export class AdbSession implements BridgeServerControl {
  readonly runner: ProcessRunner;

  private defaultDeviceId?: string;
  // Targets with a wakeup in progress
  private readonly pendingWakeups = new Set<string>();
  private readonly serverGuard?: BridgeServerGuard;
  private readonly timeoutMs?: number;
  private readonly connectSettleMs: number;
  private readonly wakeupSettleMs: number;
  private readonly keyWaitMs: number;

  constructor(options: AdbSessionOptions = {}) {
    this.runner =
      options.runner ??
      new ProcessRunner(options.binary ?? DEFAULT_BINARY, {
        singleton: options.singleton,
        debug: options.debug,
        logger: options.logger,
        spawner: options.spawner,
        resolver: options.resolver,
        reaper: options.reaper,
      });
    this.serverGuard = options.serverGuard;
    this.timeoutMs = options.timeoutMs;
    this.connectSettleMs = options.connectSettleMs ?? CONNECT_SETTLE_MS;
    this.wakeupSettleMs = options.wakeupSettleMs ?? WAKEUP_SETTLE_MS;
    this.keyWaitMs = options.keyWaitMs ?? KEY_WAIT_MS;
  }

  // Creates a session and connects to `address`, which becomes the default device
  static async open(address: string, options: AdbSessionOptions = {}): Promise<AdbSession> {
    const session = new AdbSession(options);
    await session.connect(address);
    return session;
  }

  get defaultDevice(): string | undefined {
    return this.defaultDeviceId;
  }

  async connect(address?: string): Promise<string> {
    if (this.serverGuard) {
      await this.serverGuard.ensureRestarted(this);
    }

    const { output } = await this.runner.execute(address ? ['connect', address] : ['connect'], {
      timeoutMs: this.timeoutMs,
    });
    const text = output.toLowerCase();
    const index = text.indexOf(CONNECTED_MARKER);
    if (index === -1) {
      throw new ConnectionError(output, address);
    }

    const deviceId = text
      .slice(index + CONNECTED_MARKER.length)
      .split(/\r?\n/)[0]
      .trim();
    if (!deviceId) {
      throw new ConnectionError(output, address);
    }

    if (this.defaultDeviceId === undefined) {
      this.defaultDeviceId = deviceId;
    }

    // The acknowledgment can arrive before the device answers commands
    if (!text.includes(ALREADY_CONNECTED_MARKER)) {
      await delay(this.connectSettleMs);
    }

    return deviceId;
  }

  async exec(args: CommandInput, options: CommandOptions = {}): Promise<CommandResult> {
    const target = options.device ?? this.defaultDeviceId;
    const tokens = tokenizeCommand(args);
    return this.runner.execute(target ? ['-s', target, ...tokens] : tokens, {
      filter: options.filter,
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
    });
  }

  async run(args: CommandInput, options: CommandOptions = {}): Promise<string> {
    const { output } = await this.exec(args, options);
    return output;
  }

  async shell(args: CommandInput, options: CommandOptions = {}): Promise<string> {
    return this.run(['shell', ...tokenizeCommand(args)], options);
  }

  async execOut(args: CommandInput, options: CommandOptions = {}): Promise<string> {
    return this.run(['exec-out', ...tokenizeCommand(args)], options);
  }

  async version(): Promise<string> {
    return this.runUntargeted('version');
  }

  async startServer(): Promise<string> {
    return this.runUntargeted('start-server');
  }

  async killServer(): Promise<string> {
    return this.runUntargeted('kill-server');
  }

  async waitForDevice(device?: string): Promise<string> {
    return this.run('wait-for-device', { device });
  }

  async reboot(device?: string): Promise<string> {
    return this.run('reboot', { device });
  }

  async pull(remotePath: string, localPath: string, device?: string): Promise<string> {
    return this.run(['pull', remotePath, localPath], { device });
  }

  async listInstalledPackages(device?: string): Promise<string[]> {
    const output = await this.shell(['pm', 'list', 'packages', '-f'], { device });
    return parseInstalledPackages(output);
  }

  async listPackageActivities(packageName: string, device?: string): Promise<string[]> {
    const output = await this.shell(['dumpsys', 'package', packageName], { device });
    return parseActivitiesFromDumpsys(output, packageName);
  }

  async getFocusedWindow(device?: string): Promise<FocusedWindow> {
    const output = await this.shell(['dumpsys', 'window', 'windows'], {
      device,
      filter: FOCUS_FILTER,
    });
    return parseFocusedWindow(output);
  }

  async getViewHierarchy(device?: string): Promise<HierarchyNode> {
    const output = await this.execOut(['uiautomator', 'dump', '/dev/tty'], { device });
    return parseHierarchy(stripUiDumpFooter(output));
  }

  async launch(packageName: string, activity?: string, device?: string): Promise<string> {
    if (activity) {
      return this.shell(['am', 'start', '-n', toComponentName(packageName, activity)], { device });
    }
    return this.shell(['monkey', '-p', packageName, '-c', LAUNCHER_CATEGORY, '1'], { device });
  }

  /**
   * Turns the screen on when it is off. Key presses issued from here call
   * back into wakeup(); a pending entry for the target turns those nested
   * calls into no-ops. A screen state that cannot be read throws without
   * sending any key, since POWER toggles the screen.
   */
  async wakeup(device?: string): Promise<void> {
    const target = device ?? this.defaultDeviceId ?? '';
    if (this.pendingWakeups.has(target)) {
      return;
    }
    this.pendingWakeups.add(target);
    try {
      const before = await this.readScreenState(device);
      const state = parseScreenState(before);
      if (state === 'on') {
        return;
      }
      if (state === 'unknown') {
        throw new WakeupFailedError(before);
      }

      await this.pressKey('POWER', this.wakeupSettleMs, device);
      await this.pressKey('MENU', this.wakeupSettleMs, device);

      const after = await this.readScreenState(device);
      if (parseScreenState(after) !== 'on') {
        throw new WakeupFailedError(after);
      }
    } finally {
      this.pendingWakeups.delete(target);
    }
  }

  async pressKey(names: CommandInput, waitMs = this.keyWaitMs, device?: string): Promise<string[]> {
    const keys = tokenizeCommand(names).map(name => name.toUpperCase());
    if (keys.length === 0) {
      throw new InvalidArgumentError('At least one key name is required', names);
    }
    const codes = resolveKeyCodes(keys);

    await this.wakeup(device);
    await this.shell(['input', 'keyevent', ...codes.map(String)], { device });
    await delay(waitMs);
    return keys;
  }

  async inputText(text: string, waitMs = this.keyWaitMs, device?: string): Promise<void> {
    await this.wakeup(device);
    await this.shell(['input', 'text', escapeShellArg(text.replace(/ /g, '%s'))], { device });
    await delay(waitMs);
  }

  async install(apkPath: string, flags: string | undefined = 'r', device?: string): Promise<string> {
    return this.run(['install', ...flagArgs(flags), apkPath], { device });
  }

  async uninstall(packageName: string, flags?: string, device?: string): Promise<string> {
    return this.run(['uninstall', ...flagArgs(flags), packageName], { device });
  }

  async screenshot(device?: string): Promise<DecodedScreenshot> {
    await this.wakeup(device);

    const fileName = `${randomUUID()}.png`;
    const remotePath = `${DEVICE_TMP_DIR}/${fileName}`;
    const localPath = path.join(os.tmpdir(), fileName);

    await this.shell(['screencap', '-p', remotePath], { device });
    try {
      await this.pull(remotePath, localPath, device);
    } finally {
      await this.shell(['rm', remotePath], { device });
    }

    try {
      const png = await fs.promises.readFile(localPath);
      return await decodeScreenshot(png);
    } catch (error) {
      throw new ScreenshotCaptureError(
        device ?? this.defaultDeviceId ?? 'default',
        error instanceof Error ? error : undefined
      );
    } finally {
      await fs.promises.rm(localPath, { force: true });
    }
  }

  dispose(): number {
    return this.runner.dispose();
  }

  private async readScreenState(device?: string): Promise<string> {
    return this.shell(['dumpsys', 'power'], { device, filter: SCREEN_STATE_FILTER });
  }

  private async runUntargeted(args: CommandInput): Promise<string> {
    const { output } = await this.runner.execute(args, { timeoutMs: this.timeoutMs });
    return output;
  }
}

function flagArgs(flags?: string): string[] {
  return flags ? [`-${flags}`] : [];
}
