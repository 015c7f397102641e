import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, readdir, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { createSolidFrame } from "@paperday/core";
import { FilePanelDevice, HttpPanelDevice, writeFileAtomic } from "./devices.js";

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

describe("FilePanelDevice", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "paperday-devices-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the frame as a PNG, creating directories", async () => {
    const path = join(dir, "output", "panel.png");
    await new FilePanelDevice(path).show(createSolidFrame(4, 4));

    const bytes = await readFile(path);
    expect([...bytes.subarray(0, 8)]).toEqual(PNG_SIGNATURE);
  });

  it("leaves no temporary files behind", async () => {
    await writeFileAtomic(join(dir, "a.png"), new Uint8Array([1, 2, 3]));
    expect(await readdir(dir)).toEqual(["a.png"]);
  });

  it("removes the temporary file when the rename fails", async () => {
    const target = join(dir, "panel.png");
    await mkdir(join(target, "occupied"), { recursive: true });

    await expect(writeFileAtomic(target, new Uint8Array([1, 2, 3]))).rejects.toThrow();
    expect(await readdir(dir)).toEqual(["panel.png"]);
  });
});

describe("HttpPanelDevice", () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts PNG bytes to the panel", async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 200 }));

    await new HttpPanelDevice("http://panel.local/frame").show(createSolidFrame(4, 4));

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://panel.local/frame");
    expect(init.method).toBe("POST");
    expect(init.headers).toEqual({ "Content-Type": "image/png" });
    expect([...init.body.subarray(0, 8)]).toEqual(PNG_SIGNATURE);
  });

  it("throws on a failed response", async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 500, statusText: "Internal Server Error" }));

    await expect(new HttpPanelDevice("http://panel.local/frame").show(createSolidFrame(4, 4))).rejects.toThrow(
      "Panel request failed: 500 Internal Server Error"
    );
  });
});
