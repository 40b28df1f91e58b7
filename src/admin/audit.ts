import type { Command } from "@/engine/commands";
import type { Actor } from "@/engine/types";
import { compareIds } from "@/engine/util";
import type { AuditChange, AuditEntry, ID, ISODateTime } from "@/models";

function vpLabel(vp: [number, number] | undefined): string {
  return vp ? `${vp[0]}-${vp[1]}` : "none";
}

export function buildAuditSummary(command: Command): string {
  switch (command.type) {
    case "CREATE_EVENT":
      return `Created event '${command.payload.name}'`;
    case "REGISTER_PARTICIPANT":
      return `Registered '${command.payload.participant.id}'`;
    case "APPROVE_LIST":
      return `Approved list '${command.payload.listRef}' for '${command.payload.participantId}'`;
    case "ADVANCE_EVENT_PHASE":
      return `Moved event to ${command.payload.phase}`;
    case "START_ROUND":
      return "Started next round";
    case "ACKNOWLEDGE_ROUND":
      return `Opened play for round ${command.payload.roundNumber}`;
    case "REPAIR_ROUND":
      return `Repaired round ${command.payload.roundNumber}`;
    case "COMPLETE_ROUND":
      return `Completed round ${command.payload.roundNumber}`;
    case "REPORT_RESULT":
      return `Reported ${vpLabel(command.payload.vp)} for game '${command.payload.gameId}'`;
    case "CONFIRM_RESULT":
      return `Acknowledged ${vpLabel(command.payload.vp)} for game '${command.payload.gameId}'`;
    case "OVERRIDE_RESULT":
      return `Overrode game '${command.payload.gameId}'${command.payload.reason ? `: ${command.payload.reason}` : ""}`;
    case "DROP_PARTICIPANT":
      return `Dropped '${command.payload.participantId}'`;
    case "OPEN_RITUAL":
      return `Opened seat roll for game '${command.payload.gameId}'`;
    case "SUBMIT_ROLL":
      return `Rolled in ritual '${command.payload.ritualId}'`;
    case "FINISH_EVENT":
      return "Finished event";
    default:
      return "Unknown command";
  }
}

export function createAuditEntry(params: {
  id: ID;
  eventId: ID;
  command: Command;
  at: ISODateTime;
  actor: Actor;
  change?: AuditChange;
}): AuditEntry {
  const { id, eventId, command, at, actor, change } = params;
  return {
    id,
    eventId,
    at,
    actor: { id: actor.id, name: actor.name, role: actor.role },
    commandType: command.type,
    summary: buildAuditSummary(command),
    payload: { ...command.payload },
    change,
  };
}

/** Oldest first; entries written at the same instant keep their append order. */
export function sortAudit(entries: AuditEntry[]): AuditEntry[] {
  return [...entries].sort((a, b) => compareIds(a.at, b.at));
}

export function summarizeAudit(entry: AuditEntry): string {
  const actor = entry.actor?.name ?? entry.actor?.id ?? "system";
  const line = `${entry.at} • ${actor} • ${entry.summary}`;
  if (!entry.change) {
    return line;
  }
  const { before, after } = entry.change;
  return `${line} (${before.state} ${vpLabel(before.vp)} -> ${after.state} ${vpLabel(after.vp)})`;
}
