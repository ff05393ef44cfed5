/**
 * Command-table guard run first by every decider.
 */
import { rejected, type DeciderRejected } from "@vending/decider";
import type { z } from "zod";
import type { DecidableErrorCode } from "../../errors/index.js";
import { formatIssues } from "../../inventory/index.js";
import { machineFSM } from "../machineFSM.js";
import { balanceOf, type MachineState } from "../state.js";
import type { MachineCommandName } from "../commands.js";

/**
 * Null when `command` is accepted in the current state, otherwise the
 * rejection: BUSY in a transient state, INVALID_COMMAND_FOR_STATE elsewhere.
 */
export function guardCommand(
  machine: MachineState,
  command: MachineCommandName
): DeciderRejected<DecidableErrorCode> | null {
  if (machineFSM.accepts(machine.name, command)) {
    return null;
  }

  if (machineFSM.isTransient(machine.name)) {
    return rejected("BUSY", `Machine is busy (${machine.name}); "${command}" refused`, {
      state: machine.name,
      command,
    });
  }

  const accepted = machineFSM.acceptedCommands(machine.name);
  const balance = balanceOf(machine);
  const outstanding = balance > 0 ? ` with balance ${balance} outstanding` : "";
  return rejected(
    "INVALID_COMMAND_FOR_STATE",
    `Command "${command}" is not accepted in state "${machine.name}"${outstanding}. Accepted: ${
      accepted.length > 0 ? accepted.join(", ") : "(none)"
    }`,
    { state: machine.name, command, balance, acceptedCommands: [...accepted] }
  );
}

/**
 * Validate command arguments, returning an INVALID_INPUT rejection with
 * the zod issues on failure.
 */
export function guardInput<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  command: MachineCommandName,
  input: unknown
): { ok: true; value: z.output<TSchema> } | { ok: false; rejection: DeciderRejected<DecidableErrorCode> } {
  const result = schema.safeParse(input);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  const errors = formatIssues(result.error);
  return {
    ok: false,
    rejection: rejected(
      "INVALID_INPUT",
      `Invalid ${command} arguments: ${errors.map((e) => e.message).join(", ")}`,
      { command, errors }
    ),
  };
}
