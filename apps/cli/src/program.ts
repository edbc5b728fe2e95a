import { Command } from "commander";
import type { AppConfig, GroupedTranscript } from "@mirrorline/contracts";
import {
  createTransport,
  DEFAULT_CONFIG_PATH,
  loadConfig,
  mergeConfig,
  parseLogLevel,
  saveConfig,
  SessionRegistry,
  setLogLevel,
} from "@mirrorline/core";
import { runServer } from "@mirrorline/server";
import { followSession, type LineWriter } from "./follow.js";
import { getPath, parseValue, sessionRows, setPath, tableLines, transcriptLines } from "./render.js";

export interface CliIo {
  out: LineWriter;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
};

interface GlobalOptions {
  config: string;
  transport?: string;
  url?: string;
  dir?: string;
  logLevel?: string;
}

interface ConfigOverrides {
  pageSize?: string;
}

async function resolveConfig(opts: GlobalOptions, overrides: ConfigOverrides = {}): Promise<AppConfig> {
  const base = await loadConfig(opts.config);
  if (opts.transport !== undefined && opts.transport !== "http" && opts.transport !== "file") {
    throw new Error(`unknown transport: ${opts.transport} (expected http or file)`);
  }

  const transport: Record<string, unknown> = { ...base.transport };
  if (opts.transport) transport.kind = opts.transport;
  if (opts.url) transport.baseUrl = opts.url;
  if (opts.dir) transport.directory = opts.dir;
  const sync: Record<string, unknown> = { ...base.sync };
  if (overrides.pageSize !== undefined) sync.pageSize = Number(overrides.pageSize);

  const config = mergeConfig({ ...base, sync, transport });
  const level = opts.logLevel === undefined ? config.logging.level : parseLogLevel(opts.logLevel);
  if (level === null) {
    throw new Error(`unknown log level: ${opts.logLevel ?? ""}`);
  }
  setLogLevel(level);
  return config;
}

export function createProgram(io: CliIo = consoleIo): Command {
  const program = new Command();
  program.name("mirrorline").description("Follow live agent transcripts from an authoritative session log");
  program.option("--config <path>", "Config path", DEFAULT_CONFIG_PATH);
  program.option("--transport <kind>", "Transport override (http or file)");
  program.option("--url <baseUrl>", "Authority base URL for the http transport");
  program.option("--dir <directory>", "Session directory for the file transport");
  program.option("--log-level <level>", "debug, info, warn, error, or silent");
  program.addHelpText(
    "after",
    `
Examples:
  $ mirrorline sessions
  $ mirrorline show 7f3a --json
  $ mirrorline follow 7f3a --grouped
  $ mirrorline --transport file --dir ./sessions follow demo`,
  );

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  program
    .command("follow <sessionId>")
    .description("Print a session live until interrupted")
    .option("--grouped", "Reprint the window grouped into turns on every change")
    .option("--page-size <n>", "Messages per page")
    .action(async (sessionId: string, opts: { grouped?: boolean; pageSize?: string }) => {
      const overrides: ConfigOverrides = {};
      if (opts.pageSize !== undefined) overrides.pageSize = opts.pageSize;
      const config = await resolveConfig(globals(), overrides);
      const registry = new SessionRegistry(createTransport(config.transport), config);
      const controller = new AbortController();
      process.once("SIGINT", () => controller.abort());
      try {
        await followSession(registry, sessionId, io.out, {
          grouped: opts.grouped ?? false,
          signal: controller.signal,
        });
      } finally {
        await registry.dispose();
      }
    });

  program
    .command("show <sessionId>")
    .description("Load a session once and print its most recent window")
    .option("--grouped", "Group messages into turns")
    .option("--page-size <n>", "Messages per page")
    .option("--json", "JSON output")
    .action(async (sessionId: string, opts: { grouped?: boolean; pageSize?: string; json?: boolean }) => {
      const overrides: ConfigOverrides = {};
      if (opts.pageSize !== undefined) overrides.pageSize = opts.pageSize;
      const config = await resolveConfig(globals(), overrides);
      const registry = new SessionRegistry(createTransport(config.transport), config, { autoStart: false });
      try {
        const session = registry.open(sessionId);
        await session.syncOnce();
        if (!session.isLoaded) {
          throw new Error(`could not load session ${sessionId}`);
        }
        if (opts.json) {
          io.out(
            JSON.stringify(
              {
                sessionId,
                window: session.windowState(),
                forkedFrom: session.forkedFromSessionId ?? null,
                messages: session.currentWindow().map((message) => ({
                  ...message,
                  metadata: session.metadata(message.id),
                })),
              },
              null,
              2,
            ),
          );
          return;
        }
        io.out(session.window.label());
        const grouped: GroupedTranscript = opts.grouped
          ? session.currentTurns()
          : { mode: "flat", messages: session.currentWindow() };
        for (const line of transcriptLines(grouped, (messageId) => session.metadata(messageId))) {
          io.out(line);
        }
      } finally {
        await registry.dispose();
      }
    });

  program
    .command("sessions")
    .description("List sessions known to the authority")
    .option("--json", "JSON output")
    .action(async (opts: { json?: boolean }) => {
      const config = await resolveConfig(globals());
      const transport = createTransport(config.transport);
      try {
        if (!transport.listSessions) {
          throw new Error(`the ${config.transport.kind} transport cannot list sessions`);
        }
        const sessions = await transport.listSessions();
        if (opts.json) {
          io.out(JSON.stringify(sessions, null, 2));
          return;
        }
        if (sessions.length === 0) {
          io.out("no sessions");
          return;
        }
        for (const line of tableLines(sessionRows(sessions))) io.out(line);
      } finally {
        await transport.close?.();
      }
    });

  const configCmd = program.command("config").description("Configuration");

  configCmd
    .command("get [key]")
    .description("Print the effective config, or one dotted key of it")
    .action(async (key?: string) => {
      const config = await loadConfig(globals().config);
      io.out(JSON.stringify(key ? (getPath(config, key) ?? null) : config, null, 2));
    });

  configCmd
    .command("set <key> <value>")
    .description("Set a dotted config key, e.g. sync.pageSize 100")
    .action(async (key: string, value: string) => {
      const configPath = globals().config;
      const config = await loadConfig(configPath);
      const mutable: Record<string, unknown> = {
        sync: { ...config.sync },
        follow: { ...config.follow },
        transport: { ...config.transport },
        logging: { ...config.logging },
      };
      setPath(mutable, key, parseValue(value));
      await saveConfig(mergeConfig(mutable), configPath);
      io.out(`updated ${key}`);
    });

  program
    .command("serve")
    .description("Serve open sessions over HTTP and server-sent events")
    .option("--host <host>", "Server host", process.env.MIRRORLINE_HOST ?? "127.0.0.1")
    .option("--port <port>", "Server port", process.env.MIRRORLINE_PORT ?? "8787")
    .action(async (opts: { host: string; port: string }) => {
      await runServer({ host: opts.host, port: Number(opts.port), configPath: globals().config });
    });

  return program;
}
