import { spawn } from "child_process";
import { createInterface } from "readline";
import sharp from "sharp";
import { formatFields, logError, logInfo, logWarn } from "../logger";
import { BoundingBox, Frame } from "../../shared/types";

export interface FrameSource {
  start(monitorIndex: number): void;
  stop(): void;
  /** Pixels of `region` (screen coordinates relative to the monitor), packed BGR. */
  grab(region: BoundingBox): Promise<Frame>;
}

/** Line channel to a capture process: one request line in, one response line out. */
export interface CaptureChannel {
  send(line: string): void;
  close(): void;
}

export interface CaptureChannelHandlers {
  onLine(line: string): void;
  onExit(reason: string): void;
}

export type OpenCaptureChannel = (monitorIndex: number, handlers: CaptureChannelHandlers) => CaptureChannel;

export interface PowerShellFrameSourceOptions {
  openChannel?: OpenCaptureChannel;
  timeoutMs?: number;
}

interface PendingGrab {
  resolve(base64: string): void;
  reject(error: Error): void;
  timer: NodeJS.Timeout;
}

const GRAB_TIMEOUT_MS = 2000;
const ERROR_PREFIX = "ERR";

/** Converts packed RGB(A) pixels to packed BGR, dropping alpha. */
export function toBgrFrame(pixels: Uint8Array, width: number, height: number, channels: number): Frame {
  if (channels < 3) {
    throw new Error(`Unsupported channel count: ${channels}`);
  }
  const data = new Uint8Array(width * height * 3);
  for (let pixel = 0; pixel < width * height; pixel += 1) {
    const source = pixel * channels;
    const target = pixel * 3;
    data[target] = pixels[source + 2];
    data[target + 1] = pixels[source + 1];
    data[target + 2] = pixels[source];
  }
  return { width, height, data };
}

export async function decodePngFrame(png: Buffer): Promise<Frame> {
  const { data, info } = await sharp(png).raw().toBuffer({ resolveWithObject: true });
  return toBgrFrame(data, info.width, info.height, info.channels);
}

/** `left top width height`, whole pixels, at least 1x1. */
export function buildCaptureRequest(region: BoundingBox): string {
  const width = Math.max(1, Math.trunc(region.width));
  const height = Math.max(1, Math.trunc(region.height));
  return `${Math.trunc(region.left)} ${Math.trunc(region.top)} ${width} ${height}`;
}

/**
 * Grabs screen regions through `Graphics.CopyFromScreen` in one PowerShell
 * kept alive between `start()` and `stop()`. Each request line gets one line
 * back: a base64 PNG, decoded with sharp, or `ERR <message>`.
 */
export class PowerShellFrameSource implements FrameSource {
  private readonly openChannel: OpenCaptureChannel;
  private readonly timeoutMs: number;
  private readonly pending: PendingGrab[] = [];
  private channel: CaptureChannel | null = null;
  private monitorIndex = 1;
  private started = false;

  constructor(options: PowerShellFrameSourceOptions = {}) {
    this.openChannel = options.openChannel ?? spawnCaptureProcess;
    this.timeoutMs = options.timeoutMs ?? GRAB_TIMEOUT_MS;
  }

  start(monitorIndex: number): void {
    if (this.started && this.monitorIndex === monitorIndex) {
      return;
    }
    this.closeChannel("Frame source restarted");
    this.monitorIndex = monitorIndex;
    this.started = true;
    try {
      this.ensureChannel();
    } catch (error) {
      logError("Capture process failed to start", error);
    }
    logInfo(`Frame source started ${formatFields({ monitor: monitorIndex })}`);
  }

  stop(): void {
    if (!this.started) {
      return;
    }
    this.started = false;
    this.closeChannel("Frame source stopped");
    logInfo("Frame source stopped");
  }

  async grab(region: BoundingBox): Promise<Frame> {
    if (!this.started) {
      throw new Error("Frame source not started");
    }
    const channel = this.ensureChannel();
    const base64 = await new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        // The response order is lost once a request times out.
        this.closeChannel("Screen capture timeout");
      }, this.timeoutMs);
      this.pending.push({ resolve, reject, timer });
      channel.send(buildCaptureRequest(region));
    });
    return decodePngFrame(Buffer.from(base64, "base64"));
  }

  private ensureChannel(): CaptureChannel {
    if (!this.channel) {
      this.channel = this.openChannel(this.monitorIndex, {
        onLine: (line) => this.handleLine(line),
        onExit: (reason) => this.handleExit(reason)
      });
    }
    return this.channel;
  }

  private handleLine(line: string): void {
    const next = this.pending.shift();
    if (!next) {
      logWarn(`Unexpected capture output ${formatFields({ length: line.length })}`);
      return;
    }
    clearTimeout(next.timer);
    const text = line.trim();
    if (text === "" || text.startsWith(ERROR_PREFIX)) {
      next.reject(new Error(`Screen capture failed: ${text.slice(ERROR_PREFIX.length).trim() || "empty response"}`));
      return;
    }
    next.resolve(text);
  }

  private handleExit(reason: string): void {
    this.channel = null;
    this.rejectPending(reason);
    if (this.started) {
      logWarn(`Capture process exited ${formatFields({ reason })}`);
    }
  }

  private closeChannel(reason: string): void {
    const channel = this.channel;
    this.channel = null;
    this.rejectPending(reason);
    channel?.close();
  }

  private rejectPending(reason: string): void {
    for (const grab of this.pending.splice(0)) {
      clearTimeout(grab.timer);
      grab.reject(new Error(reason));
    }
  }
}

export function buildCaptureScript(monitorIndex: number): string {
  return [
    "$ErrorActionPreference = 'Stop'",
    "Add-Type -AssemblyName System.Drawing",
    "Add-Type -AssemblyName System.Windows.Forms",
    "$screens = [System.Windows.Forms.Screen]::AllScreens",
    `$index = ${Math.trunc(monitorIndex)}`,
    "if ($index -ge 1 -and $index -le $screens.Length) { $bounds = $screens[$index - 1].Bounds } else { $bounds = [System.Windows.Forms.SystemInformation]::VirtualScreen }",
    "while ($null -ne ($line = [Console]::In.ReadLine())) {",
    "  try {",
    "    $parts = $line.Split(' ')",
    "    $bitmap = New-Object System.Drawing.Bitmap ([int]$parts[2]), ([int]$parts[3])",
    "    $graphics = [System.Drawing.Graphics]::FromImage($bitmap)",
    "    $graphics.CopyFromScreen($bounds.X + [int]$parts[0], $bounds.Y + [int]$parts[1], 0, 0, $bitmap.Size)",
    "    $stream = New-Object System.IO.MemoryStream",
    "    $bitmap.Save($stream, [System.Drawing.Imaging.ImageFormat]::Png)",
    "    $graphics.Dispose()",
    "    $bitmap.Dispose()",
    "    [Console]::Out.WriteLine([Convert]::ToBase64String($stream.ToArray()))",
    "  } catch {",
    "    [Console]::Out.WriteLine('ERR ' + ($_.Exception.Message -replace '\\s+', ' '))",
    "  }",
    "  [Console]::Out.Flush()",
    "}"
  ].join("\n");
}

function spawnCaptureProcess(monitorIndex: number, handlers: CaptureChannelHandlers): CaptureChannel {
  if (process.platform !== "win32") {
    throw new Error(`Screen capture unsupported on ${process.platform}`);
  }
  const encoded = Buffer.from(buildCaptureScript(monitorIndex), "utf16le").toString("base64");
  const child = spawn(
    "powershell",
    ["-NoProfile", "-NonInteractive", "-ExecutionPolicy", "Bypass", "-EncodedCommand", encoded],
    { stdio: ["pipe", "pipe", "pipe"], windowsHide: true }
  );
  let stderr = "";
  let exited = false;
  const exit = (reason: string) => {
    if (!exited) {
      exited = true;
      handlers.onExit(reason);
    }
  };

  createInterface({ input: child.stdout }).on("line", (line) => handlers.onLine(line));
  child.stderr.on("data", (chunk: Buffer) => {
    stderr += chunk.toString();
  });
  child.on("error", (error) => {
    exit(error.message);
  });
  child.on("close", (code) => {
    exit(stderr.trim() || `Capture process exited with code ${code}`);
  });
  child.stdin.on("error", (error) => {
    exit(error.message);
  });

  return {
    send: (line) => {
      child.stdin.write(`${line}\n`);
    },
    close: () => {
      exited = true;
      child.stdin.end();
      child.kill();
    }
  };
}
