export type NoticeSeverity = "information" | "warning" | "error";

export type Notice = {
  title: string;
  message: string;
  severity: NoticeSeverity;
};

export type OperationResult =
  | { kind: "succeeded"; notice: Notice }
  | { kind: "partial_failure"; failures: number; notice: Notice }
  | { kind: "conflict"; notice: Notice }
  | { kind: "failed"; notice: Notice }
  | { kind: "invalid"; notice: Notice }
  | { kind: "cancelled" };

export function notice(title: string, message: string, severity: NoticeSeverity = "information"): Notice {
  return { title, message, severity };
}
