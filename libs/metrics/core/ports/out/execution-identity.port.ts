/**
 * ExecutionIdentityPort - names the execution chain doing the work.
 * Used for the `thread` request field and in diagnostics only.
 */
export abstract class ExecutionIdentityPort {
  abstract current(): string;
}
