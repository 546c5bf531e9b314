#!/usr/bin/env node
import readline from "node:readline";
import {
  getEnvironmentConfig,
  getEnvironmentVariablesInfo,
  sessionConfigFromEnvironment,
} from "./config.js";
import { handleEngineIntent } from "./intent-handler.js";
import { createSession } from "./session.js";
import { Debouncer } from "./util/debounce.js";

// Diagnostics go to stderr; stdout carries one JSON result per input line.
async function main(): Promise<void> {
  const config = getEnvironmentConfig();
  const session = createSession(sessionConfigFromEnvironment(config));
  const debouncer = new Debouncer(config.debounceMs);

  console.error(
    `[Startup] Session ${session.config.sessionId}: ${session.engine.getPublicState().totalRounds} rounds from ${session.config.schedulePath}`
  );
  console.error(`[Environment] Configuration:`);
  for (const { key, isSet } of getEnvironmentVariablesInfo()) {
    console.error(`  ${key} ${isSet ? "(set)" : "(default)"}`);
  }

  const rl = readline.createInterface({ input: process.stdin, terminal: false });
  try {
    for await (const line of rl) {
      const trimmed = line.trim();
      if (!trimmed) continue;

      let raw: unknown;
      try {
        raw = JSON.parse(trimmed);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        process.stdout.write(
          JSON.stringify({ success: false, code: "INVALID_INTENT", reason }) + "\n"
        );
        continue;
      }

      const result = handleEngineIntent(session.engine, raw, { debouncer });
      process.stdout.write(JSON.stringify(result) + "\n");
    }
  } finally {
    session.close();
    console.error(
      `[Shutdown] Logs written to ${session.eventLog.filePath} and ${session.roundCsv.filePath}`
    );
  }
}

main().catch((err) => {
  console.error("[FATAL]", err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
