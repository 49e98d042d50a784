import { execFile } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

export type BrowserCommand = { command: string; args: string[] };

/**
 * Command that opens `url` on `platform`, or null when there is none.
 *
 * Windows goes through rundll32 rather than `cmd /c start`: cmd re-parses its
 * command line and would end the command at the first `&` in the query.
 */
export function getBrowserCommand(
  url: string,
  platform: NodeJS.Platform
): BrowserCommand | null {
  switch (platform) {
    case "darwin":
      return { command: "open", args: [url] };
    case "win32":
      return { command: "rundll32", args: ["url.dll,FileProtocolHandler", url] };
    case "linux":
      return { command: "xdg-open", args: [url] };
    default:
      return null;
  }
}

/**
 * Opens a URL in the default browser.
 */
export async function openBrowser(url: string): Promise<void> {
  const platform = process.platform;
  const opener = getBrowserCommand(url, platform);
  if (!opener) {
    throw new Error(`Unsupported platform: ${platform}`);
  }

  await execFileAsync(opener.command, opener.args);
}
