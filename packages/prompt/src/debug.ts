import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

const writeLogPath = process.env.TERMPROMPT_WRITE_LOG || "";
const debugRedraw = process.env.TERMPROMPT_DEBUG_REDRAW === "1";

/** Append raw terminal output to $TERMPROMPT_WRITE_LOG, if set. */
export function logWrite(data: string): void {
	if (!writeLogPath) return;
	try {
		fs.appendFileSync(writeLogPath, data, { encoding: "utf8" });
	} catch {
		// Ignore logging errors
	}
}

/** Record why a full redraw happened when TERMPROMPT_DEBUG_REDRAW=1. */
export function logRedraw(reason: string): void {
	if (!debugRedraw) return;
	const logPath = path.join(os.tmpdir(), "termprompt-debug.log");
	try {
		fs.appendFileSync(logPath, `[${new Date().toISOString()}] fullRedraw: ${reason}\n`);
	} catch {
		// Ignore logging errors
	}
}
