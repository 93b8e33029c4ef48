import { Command, InvalidArgumentError } from "commander";
import { joinPath, parseEntryPath, toDisplayString } from "@passdeck/core-domain";
import {
  ChokidarFileWatcher,
  ConsoleLogger,
  ENTRY_EXTENSION,
  InteractiveActions,
  PassStoreAdapter,
  ResyncScheduler,
  TableCoordinator,
  createHiddenPathIgnore,
  createPassRunner,
  createSchedulerSession,
  generatePassword,
  loadConfig,
  storeExists,
  type EnvSource,
  type FileWatcher,
  type Logger,
  type OperationResult,
  type PassdeckConfig,
  type Prompter,
  type Session,
  type ReconcileResult,
  type StoreAdapter,
} from "@passdeck/core-application";

import { pausingInput } from "./lib/input-session";
import { createTerminalAsk, openTerminalInput, type Ask, type CommandInput } from "./lib/prompt";
import { TerminalPrompter } from "./lib/terminal-prompter";

type EntryJson = {
  ordinal: number;
  path: string;
  profile: string;
  category: string;
  name: string;
};

export type CliDependencies = {
  env?: EnvSource;
  createLogger?: (config: PassdeckConfig) => Logger;
  createStore?: (config: PassdeckConfig, logger: Logger) => StoreAdapter;
  createWatcher?: (logger: Logger) => FileWatcher;
  /** Command lines read while `watch` runs; defaults to stdin. */
  openInput?: () => CommandInput;
  storeExists?: (config: PassdeckConfig) => Promise<boolean>;
  ask?: Ask;
  prompter?: Prompter;
  write?: (line: string) => void;
  setExitCode?: (code: number) => void;
  /** Resolves when `watch` should stop; defaults to the next SIGINT. */
  waitForStop?: () => Promise<void>;
};

type OpenedStore = {
  config: PassdeckConfig;
  logger: Logger;
  store: StoreAdapter;
};

type Context = Omit<OpenedStore, "store"> & { coordinator: TableCoordinator };

function defaultStore(config: PassdeckConfig, logger: Logger): StoreAdapter {
  return new PassStoreAdapter({
    storeDir: config.storeDir,
    runner: createPassRunner(config.passBin, {
      ...process.env,
      PASSWORD_STORE_DIR: config.storeDir,
      PASSWORD_STORE_CLIP_TIME: String(config.clipTimeSeconds),
    }),
    logger,
  });
}

function nextSigint(): Promise<void> {
  return new Promise((resolve) => {
    process.once("SIGINT", () => resolve());
  });
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function createInterface(deps: CliDependencies = {}): Command {
  const write = deps.write ?? ((line: string) => console.log(line));
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });
  const ask = deps.ask ?? createTerminalAsk();
  const prompter = deps.prompter ?? new TerminalPrompter(ask, write);

  async function openStore(): Promise<OpenedStore> {
    const config = loadConfig({ env: deps.env });
    const logger = deps.createLogger?.(config) ?? new ConsoleLogger(config.logLevel);

    if (!(await (deps.storeExists ?? storeExists)(config))) {
      throw new Error(`Password store not found at ${config.storeDir}`);
    }

    return { config, logger, store: (deps.createStore ?? defaultStore)(config, logger) };
  }

  async function connect(opened: OpenedStore, session?: Session): Promise<TableCoordinator> {
    const coordinator = new TableCoordinator({
      store: opened.store,
      logger: opened.logger,
      session,
      clipTimeSeconds: opened.config.clipTimeSeconds,
    });
    await coordinator.refresh();
    return coordinator;
  }

  async function openContext(): Promise<Context> {
    const opened = await openStore();
    return { config: opened.config, logger: opened.logger, coordinator: await connect(opened) };
  }

  function report(result: OperationResult): void {
    if (result.kind === "cancelled") {
      write("Cancelled.");
      return;
    }
    write(`${result.notice.title} ${result.notice.message}`);
    if (result.kind !== "succeeded") setExitCode(1);
  }

  function focusPath(coordinator: TableCoordinator, p: string): boolean {
    if (coordinator.findAndSelect(p)) return true;

    write(`No such password: ${p}`);
    setExitCode(1);
    return false;
  }

  /** Selects each path; false (after reporting) when one is not in the store. */
  function selectPaths(coordinator: TableCoordinator, paths: string[]): boolean {
    for (const p of paths) {
      if (!focusPath(coordinator, p)) return false;
      coordinator.table.select();
    }
    return true;
  }

  const program = new Command();
  program
    .name("passdeck")
    .description("Browse and reorganise a pass password store")
    .showHelpAfterError();

  program
    .command("ls")
    .description("List every password in store order")
    .option("--json", "Output the rows as JSON")
    .action(async (cmdOptions: { json?: boolean }) => {
      const { coordinator } = await openContext();
      const rows = coordinator.table.rows;

      if (cmdOptions.json) {
        const payload: EntryJson[] = rows.map((row) => ({
          ordinal: row.ordinal,
          path: toDisplayString(row.id),
          ...row.id,
        }));
        write(JSON.stringify(payload, null, 2));
        return;
      }
      for (const p of coordinator.table.displayPaths()) write(p);
    });

  program
    .command("mv")
    .description("Move passwords into another directory")
    .argument("<paths...>", "Passwords to move")
    .option("-t, --to <destination>", "Destination directory (asked for when omitted)")
    .option("-k, --keep-category", "Keep each password's category below the destination", false)
    .action(async (paths: string[], cmdOptions: { to?: string; keepCategory?: boolean }) => {
      const { coordinator } = await openContext();
      if (!selectPaths(coordinator, paths)) return;

      if (cmdOptions.to === undefined) {
        report(await new InteractiveActions(coordinator, prompter).requestMove());
        return;
      }
      report(
        await coordinator.moveSelected({
          destination: cmdOptions.to,
          keepCategory: Boolean(cmdOptions.keepCategory),
        })
      );
    });

  program
    .command("rename")
    .description("Rename a password inside its directory")
    .argument("<path>", "Password to rename")
    .argument("[newName]", "New name (asked for when omitted)")
    .action(async (p: string, newName: string | undefined) => {
      const { coordinator } = await openContext();
      if (!focusPath(coordinator, p)) return;

      if (newName === undefined) {
        report(await new InteractiveActions(coordinator, prompter).requestRename());
        return;
      }
      report(await coordinator.renameCurrent(newName));
    });

  program
    .command("rm")
    .description("Remove passwords")
    .argument("<paths...>", "Passwords to remove")
    .option("-y, --yes", "Do not ask for confirmation", false)
    .action(async (paths: string[], cmdOptions: { yes?: boolean }) => {
      const { coordinator } = await openContext();
      if (!selectPaths(coordinator, paths)) return;

      report(
        cmdOptions.yes
          ? await coordinator.deleteSelected()
          : await new InteractiveActions(coordinator, prompter).requestDelete()
      );
    });

  program
    .command("insert")
    .description("Insert a new password")
    .argument("[path]", "Path of the new password (asked for when omitted)")
    .option("-u, --username <name>", "Username stored on the second line")
    .option("-g, --generate [length]", "Generate the password instead of asking for it")
    .action(async (p: string | undefined, cmdOptions: { username?: string; generate?: string | boolean }) => {
      const { coordinator } = await openContext();

      if (p === undefined) {
        report(await new InteractiveActions(coordinator, prompter).requestInsert());
        return;
      }

      const id = parseEntryPath(joinPath(p));

      let secret: string;
      if (cmdOptions.generate === undefined || cmdOptions.generate === false) {
        secret = await ask(`Password for ${joinPath(p)}: `);
      } else {
        const length = cmdOptions.generate === true ? undefined : parsePositiveInt(cmdOptions.generate);
        secret = generatePassword({ length });
      }

      report(
        await coordinator.insert({
          profile: id.profile,
          category: id.category,
          name: id.name,
          secret,
          secondary: cmdOptions.username,
        })
      );
    });

  program
    .command("edit")
    .description("Open a password in the editor")
    .argument("<path>", "Password to edit")
    .action(async (p: string) => {
      const { coordinator } = await openContext();
      if (!focusPath(coordinator, p)) return;

      if (!(await coordinator.edit())) setExitCode(1);
    });

  program
    .command("copy")
    .description("Copy a password (or its username) to the clipboard")
    .argument("<path>", "Password to copy from")
    .option("--username", "Copy the username line instead", false)
    .action(async (p: string, cmdOptions: { username?: boolean }) => {
      const { coordinator } = await openContext();
      if (!focusPath(coordinator, p)) return;

      report(cmdOptions.username ? await coordinator.copyUsername() : await coordinator.copyPassword());
    });

  program
    .command("find")
    .description("Look a password up and print its path")
    .action(async () => {
      const { coordinator } = await openContext();
      const found = await new InteractiveActions(coordinator, prompter).requestFind();
      const row = coordinator.table.currentRow;

      if (!found || !row) {
        write("Nothing found.");
        setExitCode(1);
        return;
      }
      write(toDisplayString(row.id));
    });

  program
    .command("generate")
    .description("Print a random password")
    .option("-l, --length <n>", "Password length", parsePositiveInt)
    .option("--no-upper", "Leave out upper-case letters")
    .option("--no-lower", "Leave out lower-case letters")
    .option("--no-digits", "Leave out digits")
    .option("--no-punctuation", "Leave out punctuation")
    .action(
      (cmdOptions: { length?: number; upper: boolean; lower: boolean; digits: boolean; punctuation: boolean }) => {
        write(generatePassword(cmdOptions));
      }
    );

  /** Runs `watch` commands until `quit` or the end of the input. */
  async function runWatchCommands(coordinator: TableCoordinator, input: CommandInput): Promise<void> {
    for await (const raw of input) {
      const [command = "", ...rest] = raw.trim().split(/\s+/);
      const arg = rest.join(" ");

      if (command === "") continue;
      if (command === "quit" || command === "q") return;

      if (command === "ls") {
        for (const p of coordinator.table.displayPaths()) write(p);
      } else if (command === "edit" && arg) {
        if (focusPath(coordinator, arg)) await coordinator.edit();
      } else {
        write(`Unknown command: ${raw.trim()} (try: ls, edit <path>, quit)`);
      }
    }
  }

  async function watchStore(opened: OpenedStore, input: CommandInput): Promise<void> {
    const { config, logger } = opened;

    // the scheduler refreshes the coordinator, whose editor session pauses the scheduler
    const scheduler = new ResyncScheduler(
      { refresh: () => coordinator.refresh() },
      {
        logger,
        intervalMs: config.resyncIntervalMs,
        onResync: (result: ReconcileResult) => {
          for (const id of result.removed) write(`- ${toDisplayString(id)}`);
          for (const id of result.added) write(`+ ${toDisplayString(id)}`);
        },
      }
    );
    const coordinator = await connect(opened, pausingInput(createSchedulerSession(scheduler), input));

    const watcher = config.watch
      ? (deps.createWatcher ?? ((l: Logger) => new ChokidarFileWatcher(l)))(logger)
      : null;

    try {
      if (watcher) {
        scheduler.attach(watcher);
        await watcher.start({
          rootDir: config.storeDir,
          ignore: createHiddenPathIgnore(config.storeDir),
          entryExtension: ENTRY_EXTENSION,
        });
      }

      write(`Watching ${coordinator.table.size} password(s) in ${config.storeDir}`);
      await scheduler.start();
      await Promise.race([(deps.waitForStop ?? nextSigint)(), runWatchCommands(coordinator, input)]);
    } finally {
      scheduler.stop();
      await watcher?.stop();
    }
  }

  program
    .command("watch")
    .description("Keep the listing in sync with the store and print every change; reads ls, edit <path> and quit")
    .action(async () => {
      const opened = await openStore();
      const input = (deps.openInput ?? openTerminalInput)();
      try {
        await watchStore(opened, input);
      } finally {
        input.close();
      }
    });

  return program;
}
