/**
 * Task alarms
 *
 * Sounds live in <soundDir>/<name>.wav and play through aplay on Linux.
 * Elsewhere, and for the "beep" sound, the terminal bell rings instead.
 */

import { spawn } from "child_process";
import { existsSync } from "fs";
import { join } from "path";
import type { AlarmSound } from "@paperday/schedule";

export interface AlarmPlayer {
  play(sound: AlarmSound): void;
}

export interface SystemAlarmPlayerOptions {
  soundDir: string;
  platform?: NodeJS.Platform;
  /** Spawns the player process; replaceable in tests */
  spawnPlayer?: (command: string, args: string[]) => { on(event: "error", listener: (error: Error) => void): unknown };
  ringBell?: () => void;
}

export function soundPath(soundDir: string, sound: AlarmSound): string {
  return join(soundDir, `${sound}.wav`);
}

export class SystemAlarmPlayer implements AlarmPlayer {
  private readonly platform: NodeJS.Platform;
  private readonly spawnPlayer: NonNullable<SystemAlarmPlayerOptions["spawnPlayer"]>;
  private readonly ringBell: () => void;

  constructor(private readonly options: SystemAlarmPlayerOptions) {
    this.platform = options.platform ?? process.platform;
    this.spawnPlayer =
      options.spawnPlayer ?? ((command, args) => spawn(command, args, { stdio: "ignore", detached: false }));
    this.ringBell = options.ringBell ?? (() => process.stdout.write("\x07"));
  }

  /**
   * Start playback without waiting for it to finish
   */
  play(sound: AlarmSound): void {
    if (sound === "beep" || this.platform !== "linux") {
      this.ringBell();
      return;
    }

    const path = soundPath(this.options.soundDir, sound);
    if (!existsSync(path)) {
      console.warn(`[alarm] Cannot find sound file: ${path}`);
      return;
    }

    this.spawnPlayer("aplay", ["-q", path]).on("error", (error) => {
      console.warn(`[alarm] Failed to play ${sound}:`, error);
    });
  }
}
