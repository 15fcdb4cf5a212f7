/**
 * Gate Engine — Row Construction
 *
 * Every GateRow is built here. A Soft-Pass without exactly one flip-trigger,
 * or a flip-trigger on anything but a Soft-Pass, is a contract violation.
 */

import { GateContractError } from "@/lib/errors";
import { isIsoDate } from "@/lib/utils/dates";
import type { GateRow } from "@/lib/dossier/types";
import type { GateDefinition, GateVerdict } from "./types";

export function assertGateRow(row: GateRow): void {
  if (row.result === "Soft-Pass") {
    if (!row.flipTrigger || !row.flipTrigger.description || !isIsoDate(row.flipTrigger.deadline)) {
      throw new GateContractError(
        "SOFT_PASS_WITHOUT_TRIGGER",
        `Gate ${row.gateId}: Soft-Pass requires a flip-trigger with an explicit deadline`,
        { gateId: row.gateId },
      );
    }
  } else if (row.flipTrigger) {
    throw new GateContractError("TRIGGER_ON_NON_SOFT_PASS", `Gate ${row.gateId}: flip-trigger on a ${row.result} row`, {
      gateId: row.gateId,
      result: row.result,
    });
  }
}

export function createGateRow(row: GateRow): GateRow {
  assertGateRow(row);
  return row;
}

export function rowFromVerdict(def: GateDefinition, verdict: GateVerdict): GateRow {
  return createGateRow({
    gateId: def.id,
    label: def.label,
    hardness: def.hardness,
    result: verdict.result,
    rule: def.rule,
    metricIds: [...def.metricRefs],
    ...(verdict.result === "Soft-Pass" ? { flipTrigger: { ...verdict.flipTrigger } } : {}),
    evidence: verdict.evidence ? verdict.evidence.map((e) => ({ ...e })) : [],
  });
}
