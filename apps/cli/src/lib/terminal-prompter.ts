import { formatEntryId, joinPath, toDisplayString, type EntryId } from "@passdeck/core-domain";
import {
  generatePassword,
  rankEntries,
  type InsertRequest,
  type MoveRequest,
  type Prompter,
} from "@passdeck/core-application";

import { isYes, type Ask } from "./prompt";

/** Splits `profile/category...` into its first segment and the rest. */
export function splitLocation(location: string): { profile: string; category: string } {
  const [profile = "", ...rest] = joinPath(location).split("/");
  return { profile, category: rest.join("/") };
}

/**
 * Line-oriented answers to the coordinator's dialogs. An empty answer
 * dismisses a dialog.
 */
export class TerminalPrompter implements Prompter {
  constructor(
    private readonly ask: Ask,
    private readonly write: (line: string) => void
  ) {}

  async confirmDelete(targets: readonly EntryId[]): Promise<boolean> {
    for (const id of targets) this.write(`  ${toDisplayString(id)}`);
    return isYes(await this.ask(`Delete ${targets.length} password(s)? [y/N] `));
  }

  async chooseMoveDestination(targets: readonly EntryId[]): Promise<MoveRequest | null> {
    const destination = await this.ask(`Move ${targets.length} password(s) to: `);
    if (!destination) return null;

    const keepCategory = isYes(await this.ask("Keep categories? [y/N] "));
    return { destination, keepCategory };
  }

  async chooseNewName(target: EntryId): Promise<string | null> {
    const name = await this.ask(`New name for ${formatEntryId(target)}: `);
    return name || null;
  }

  async chooseEntry(candidates: readonly string[]): Promise<string | null> {
    const query = await this.ask("Find: ");
    const [best] = rankEntries(candidates, query, { limit: 1 });
    return best?.path ?? null;
  }

  async describeNewEntry(): Promise<InsertRequest | null> {
    const name = await this.ask("Name: ");
    if (!name) return null;

    const { profile, category } = splitLocation(await this.ask("Location (profile/category): "));
    const typed = await this.ask("Password (empty to generate): ");
    const secondary = await this.ask("Username: ");

    return { profile, category, name, secret: typed || generatePassword(), secondary };
  }
}
