import { spawn } from "child_process";
import { logError } from "../logger";

export interface WindowProbe {
  /** Title of the focused window, or null when it cannot be determined. */
  getForegroundTitle(nowMs: number): Promise<string | null>;
}

const CACHE_MS = 1000;
const QUERY_TIMEOUT_MS = 1200;

/** Case-insensitive containment; an empty target matches any window. */
export function windowTitleMatches(targetTitle: string, foregroundTitle: string | null): boolean {
  const target = targetTitle.trim().toLowerCase();
  if (!target) {
    return true;
  }
  if (foregroundTitle === null) {
    return false;
  }
  return foregroundTitle.toLowerCase().includes(target);
}

export class PowerShellWindowProbe implements WindowProbe {
  private cachedTitle: string | null = null;
  private cachedAtMs = 0;
  private hasCache = false;
  private inFlight: Promise<string | null> | null = null;

  async getForegroundTitle(nowMs: number): Promise<string | null> {
    if (this.hasCache && nowMs - this.cachedAtMs < CACHE_MS) {
      return this.cachedTitle;
    }
    if (this.inFlight) {
      return this.inFlight;
    }

    this.inFlight = runForegroundTitleQuery()
      .then((title) => {
        this.cachedTitle = title;
        this.cachedAtMs = nowMs;
        this.hasCache = true;
        return title;
      })
      .catch((error: unknown) => {
        logError("Foreground window query failed", error);
        return this.cachedTitle;
      })
      .finally(() => {
        this.inFlight = null;
      });

    return this.inFlight;
  }
}

function runForegroundTitleQuery(): Promise<string | null> {
  if (process.platform !== "win32") {
    return Promise.resolve(null);
  }

  const script = [
    "$ErrorActionPreference = 'Stop'",
    "Add-Type @\"",
    "using System;",
    "using System.Runtime.InteropServices;",
    "using System.Text;",
    "public static class SlotwatchForeground {",
    "  [DllImport(\"user32.dll\")] public static extern IntPtr GetForegroundWindow();",
    "  [DllImport(\"user32.dll\", CharSet=CharSet.Unicode)] public static extern int GetWindowText(IntPtr hWnd, StringBuilder text, int count);",
    "}",
    "\"@",
    "$hwnd = [SlotwatchForeground]::GetForegroundWindow()",
    "if ($hwnd -eq [IntPtr]::Zero) { exit 3 }",
    "$builder = New-Object System.Text.StringBuilder 1024",
    "[SlotwatchForeground]::GetWindowText($hwnd, $builder, $builder.Capacity) | Out-Null",
    "[Console]::OutputEncoding = [System.Text.Encoding]::UTF8",
    "Write-Output $builder.ToString()"
  ].join("\n");

  return new Promise((resolve, reject) => {
    const child = spawn(
      "powershell",
      ["-NoProfile", "-ExecutionPolicy", "Bypass", "-Command", "-"],
      { stdio: ["pipe", "pipe", "pipe"], windowsHide: true }
    );
    let stdout = "";
    let stderr = "";
    const timeout = setTimeout(() => {
      child.kill();
      reject(new Error("Foreground window query timeout"));
    }, QUERY_TIMEOUT_MS);

    child.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString("utf8");
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    child.on("error", (error) => {
      clearTimeout(timeout);
      reject(error);
    });
    child.on("close", (code) => {
      clearTimeout(timeout);
      // 3: no window has focus
      if (code === 3) {
        resolve(null);
        return;
      }
      if (code !== 0) {
        reject(new Error(stderr || stdout || `Foreground window query failed: ${code}`));
        return;
      }
      resolve(stdout.replace(/\r?\n$/, ""));
    });

    child.stdin.write(script);
    child.stdin.end();
  });
}
