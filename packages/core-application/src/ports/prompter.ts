import type { EntryId } from "@passdeck/core-domain";
import type { InsertRequest, MoveRequest } from "../value-objects/requests";

/**
 * Sub-dialogs a bulk operation waits on. Resolving to `null` (or `false`
 * for the delete confirmation) means the dialog was dismissed.
 */
export interface Prompter {
  confirmDelete(targets: readonly EntryId[]): Promise<boolean>;
  chooseMoveDestination(targets: readonly EntryId[]): Promise<MoveRequest | null>;
  chooseNewName(target: EntryId): Promise<string | null>;
  chooseEntry(candidates: readonly string[]): Promise<string | null>;
  describeNewEntry(): Promise<InsertRequest | null>;
}
