import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { SystemAlarmPlayer, soundPath } from "./alarm.js";

describe("SystemAlarmPlayer", () => {
  let soundDir: string;
  const on = vi.fn();
  const spawnPlayer = vi.fn((_command: string, _args: string[]) => ({ on }));
  const ringBell = vi.fn();

  beforeEach(async () => {
    soundDir = await mkdtemp(join(tmpdir(), "paperday-sound-"));
    on.mockClear();
    spawnPlayer.mockClear();
    ringBell.mockClear();
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(soundDir, { recursive: true, force: true });
  });

  it("plays the sound file with aplay on Linux", async () => {
    await writeFile(soundPath(soundDir, "uprising"), "RIFF");
    const player = new SystemAlarmPlayer({ soundDir, platform: "linux", spawnPlayer, ringBell });

    player.play("uprising");

    expect(spawnPlayer).toHaveBeenCalledWith("aplay", ["-q", join(soundDir, "uprising.wav")]);
    expect(on).toHaveBeenCalledWith("error", expect.any(Function));
    expect(ringBell).not.toHaveBeenCalled();
  });

  it("logs a missing sound file", () => {
    const player = new SystemAlarmPlayer({ soundDir, platform: "linux", spawnPlayer, ringBell });

    player.play("calm");

    expect(spawnPlayer).not.toHaveBeenCalled();
    expect(vi.mocked(console.warn)).toHaveBeenCalledWith(
      `[alarm] Cannot find sound file: ${join(soundDir, "calm.wav")}`
    );
  });

  it("rings the bell for beep", () => {
    new SystemAlarmPlayer({ soundDir, platform: "linux", spawnPlayer, ringBell }).play("beep");
    expect(ringBell).toHaveBeenCalledTimes(1);
    expect(spawnPlayer).not.toHaveBeenCalled();
  });

  it("rings the bell on other platforms", () => {
    new SystemAlarmPlayer({ soundDir, platform: "darwin", spawnPlayer, ringBell }).play("uprising");
    expect(ringBell).toHaveBeenCalledTimes(1);
  });
});
