#!/usr/bin/env node
// ─── wmsd-midi: MCP Server ──────────────────────────────────────────────────
//
// Exposes the converter as MCP tools so an assistant can turn game music
// containers into MIDI and check the result.
//
// Usage:
//   node dist/mcp-server.js          # stdio transport
//
// Tools:
//   convert_msd   — convert a .msd file or a directory of them to .mid
//   describe_msd  — dry-run a conversion and report packets, events, loop point
//   inspect_midi  — summarize a .mid file (tempo map, markers, event mix)
// ─────────────────────────────────────────────────────────────────────────────

import { readFile } from "node:fs/promises";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { convertPaths, formatBatchLine } from "./batch.js";
import { resolveConfig } from "./config/schema.js";
import { formatInspection, inspectMidiFile } from "./midi/inspect.js";
import { assembleTrack } from "./msd/convert.js";
import { LOOP_STYLES } from "./msd/types.js";
import { formatReport } from "./report.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function errorResult(err: unknown) {
  return {
    content: [{ type: "text" as const, text: `Error: ${err instanceof Error ? err.message : String(err)}` }],
    isError: true,
  };
}

// ─── Server ─────────────────────────────────────────────────────────────────

const server = new McpServer({
  name: "wmsd-midi",
  version: "0.1.0",
});

// ─── Tool: convert_msd ──────────────────────────────────────────────────────

server.tool(
  "convert_msd",
  "Convert a WMSD music file (.msd), or every .msd in a directory, to a Standard MIDI File.",
  {
    path: z.string().describe("Path to a .msd file or a directory containing .msd files"),
    loopStyle: z.enum(LOOP_STYLES).optional().describe("Loop markers: 'meta' (FF 06 loopStart/loopEnd) or 'controller' (CC 111)"),
    outDir: z.string().optional().describe("Directory for the .mid files (default: beside each input)"),
    overwrite: z.boolean().optional().describe("Replace existing .mid files (default true)"),
  },
  async ({ path, loopStyle, outDir, overwrite }) => {
    try {
      const config = resolveConfig({ loopStyle, outDir, overwrite });
      const results = await convertPaths(path, config);
      if (results.length === 0) {
        return { content: [{ type: "text", text: `No .msd files found in: ${path}` }] };
      }

      const failed = results.filter(r => r.status === "error").length;
      const text = results.map((r, i) => formatBatchLine(i + 1, r)).join("\n");
      return {
        content: [{ type: "text", text: `${text}\n\n${results.length - failed}/${results.length} succeeded.` }],
        isError: failed === results.length,
      };
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ─── Tool: describe_msd ─────────────────────────────────────────────────────

server.tool(
  "describe_msd",
  "Analyze a .msd file without writing anything: packet count, event mix, loop point, output size.",
  {
    path: z.string().describe("Path to a .msd file"),
    loopStyle: z.enum(LOOP_STYLES).optional().describe("Loop marker style to assume (default 'meta')"),
  },
  async ({ path, loopStyle }) => {
    try {
      const bytes = await readFile(path);
      const { report } = assembleTrack(bytes, { loopStyle });
      return { content: [{ type: "text", text: formatReport(report) }] };
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ─── Tool: inspect_midi ─────────────────────────────────────────────────────

server.tool(
  "inspect_midi",
  "Summarize a Standard MIDI File: format, tempo changes, loop markers, event counts.",
  {
    path: z.string().describe("Path to a .mid file"),
  },
  async ({ path }) => {
    try {
      const info = await inspectMidiFile(path);
      return { content: [{ type: "text", text: formatInspection(info) }] };
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ─── Start ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("wmsd-midi MCP server running on stdio");
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
