import { config } from "dotenv";
config({ path: ".env.local" });

import { runSetup } from "./setup";
import { createBookingContext } from "@/booking";
import { getEnv } from "@/booking/config/env";
import { openDatabase, closeDatabase } from "@/booking/store/db";
import { readResource } from "@/booking/render/resources";
import { PROMPT_NAMES, renderPrompt } from "@/booking/render/prompts";
import { invokeTool, createToolRegistry } from "@/booking/tools";

const USAGE = `Usage:
  booking [setup] [--no-seed]     create the store, insert sample data, print statistics
  booking tool <name> [json-args] run a tool and print its JSON result
  booking tools                   list the available tools
  booking resource <uri>          print appointment://{id}, schedule://{date} or client://{id}
  booking prompt <name> [arg]     print daily_briefing [date] or appointment_reminder <id>`;

const args = process.argv.slice(2);
const command = args[0] && !args[0].startsWith("--") ? args[0] : "setup";

function parseToolArgs(raw: string | undefined): unknown {
  if (!raw) return {};
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new Error(`Tool arguments must be valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

async function main() {
  const env = getEnv();

  switch (command) {
    case "setup":
      await runSetup({ dbPath: env.BOOKING_DB_PATH, seed: !args.includes("--no-seed") });
      return;

    case "tools":
      for (const tool of createToolRegistry().list()) {
        console.log(`${tool.name}\n  ${tool.description}`);
      }
      return;

    case "tool": {
      const name = args[1];
      if (!name) throw new Error(`Missing tool name.\n\n${USAGE}`);
      const toolArgs = parseToolArgs(args[2]);

      const db = openDatabase(env.BOOKING_DB_PATH);
      try {
        const result = invokeTool(createBookingContext(db), name, toolArgs);
        console.log(JSON.stringify(result, null, 2));
        if (!result.success) process.exitCode = 1;
      } finally {
        closeDatabase(db);
      }
      return;
    }

    case "resource": {
      const uri = args[1];
      if (!uri) throw new Error(`Missing resource URI.\n\n${USAGE}`);

      const db = openDatabase(env.BOOKING_DB_PATH);
      try {
        console.log(readResource(createBookingContext(db), uri));
      } finally {
        closeDatabase(db);
      }
      return;
    }

    case "prompt": {
      const name = args[1];
      if (!name) throw new Error(`Missing prompt name (${PROMPT_NAMES.join(", ")}).\n\n${USAGE}`);

      const db = openDatabase(env.BOOKING_DB_PATH);
      try {
        console.log(renderPrompt(createBookingContext(db), name, args[2]));
      } finally {
        closeDatabase(db);
      }
      return;
    }

    default:
      throw new Error(`Unknown command "${command}".\n\n${USAGE}`);
  }
}

main().catch((err) => {
  console.error("Booking command failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});
