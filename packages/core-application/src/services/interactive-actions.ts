import type { Prompter } from "../ports/prompter";
import type { OperationResult } from "../value-objects/operation-result";
import type { TableCoordinator } from "./table-coordinator";

const CANCELLED: OperationResult = { kind: "cancelled" };

/**
 * Dialog-driven entry points. Each waits on its dialog outside the
 * operation queue, so resyncs keep running while the user decides, and
 * dismissing a dialog changes nothing.
 */
export class InteractiveActions {
  constructor(
    private readonly coordinator: TableCoordinator,
    private readonly prompter: Prompter
  ) {}

  async requestDelete(): Promise<OperationResult> {
    const targets = this.coordinator.table.selectedRows().map((row) => row.id);
    if (targets.length === 0) return CANCELLED;

    if (!(await this.prompter.confirmDelete(targets))) return CANCELLED;
    return this.coordinator.deleteSelected();
  }

  async requestMove(): Promise<OperationResult> {
    const targets = this.coordinator.table.selectedRows().map((row) => row.id);
    if (targets.length === 0) return CANCELLED;

    const request = await this.prompter.chooseMoveDestination(targets);
    if (!request) return CANCELLED;
    return this.coordinator.moveSelected(request);
  }

  async requestRename(): Promise<OperationResult> {
    const row = this.coordinator.table.currentRow;
    if (!row) return CANCELLED;

    const target = row.id;
    const newName = await this.prompter.chooseNewName(target);
    if (newName === null) return CANCELLED;
    return this.coordinator.rename(target, newName);
  }

  async requestInsert(): Promise<OperationResult> {
    const request = await this.prompter.describeNewEntry();
    if (!request) return CANCELLED;
    return this.coordinator.insert(request);
  }

  async requestFind(): Promise<boolean> {
    const choice = await this.prompter.chooseEntry(this.coordinator.table.displayPaths());
    if (choice === null) return false;
    return this.coordinator.findAndSelect(choice);
  }
}
