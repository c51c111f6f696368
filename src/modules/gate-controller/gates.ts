/**
 * Gate definitions: which status a gate guards, where approval leads and
 * who decides it.
 */

import { GATE_ORDER } from '../../core/types.js'
import type { AgentName, GateId, TaskStatus } from '../../core/types.js'

/** A human gate is decided by an explicit confirmation, never by a sub-agent */
export type GateWorker = AgentName | 'human'

export interface GateDefinition {
  id: GateId
  /** Status a task must be in for the gate to be entered */
  entryStatus: TaskStatus
  /** Status the task moves to on an Approved verdict */
  approvedStatus: TaskStatus
  worker: GateWorker
  description: string
}

export const GATE_DEFINITIONS: Record<GateId, GateDefinition> = {
  requirements: {
    id: 'requirements',
    entryStatus: 'RequirementsReview',
    approvedStatus: 'TestPlanReview',
    worker: 'human',
    description: 'Business requirements signed off',
  },
  test_plan: {
    id: 'test_plan',
    entryStatus: 'TestPlanReview',
    approvedStatus: 'TechnicalReview',
    worker: 'human',
    description: 'Test plan signed off',
  },
  technical_review: {
    id: 'technical_review',
    entryStatus: 'TechnicalReview',
    approvedStatus: 'SplitEvaluation',
    worker: 'planner-reviewer',
    description: 'Technical plan reviewed',
  },
  split_evaluation: {
    id: 'split_evaluation',
    entryStatus: 'SplitEvaluation',
    approvedStatus: 'ReadyForImplementation',
    worker: 'splitter',
    description: 'Split into sub-tasks evaluated',
  },
  implementation: {
    id: 'implementation',
    entryStatus: 'InProgress',
    approvedStatus: 'InReview',
    worker: 'validator',
    description: 'Implementation validated against acceptance criteria',
  },
  code_review: {
    id: 'code_review',
    entryStatus: 'InReview',
    approvedStatus: 'DocumentationUpdate',
    worker: 'pr-creator',
    description: 'Change request prepared',
  },
  documentation: {
    id: 'documentation',
    entryStatus: 'DocumentationUpdate',
    approvedStatus: 'ReadyToMerge',
    worker: 'doc-updater',
    description: 'Documentation updated',
  },
  merge: {
    id: 'merge',
    entryStatus: 'ReadyToMerge',
    approvedStatus: 'Done',
    worker: 'human',
    description: 'Merge confirmed',
  },
}

export function getGate(gateId: GateId): GateDefinition {
  return GATE_DEFINITIONS[gateId]
}

export function isHumanGate(gateId: GateId): boolean {
  return GATE_DEFINITIONS[gateId].worker === 'human'
}

/** Gate guarding a status, if that status is a gate's entry status */
export function gateForEntryStatus(status: TaskStatus): GateDefinition | undefined {
  return GATE_ORDER.map((id) => GATE_DEFINITIONS[id]).find((g) => g.entryStatus === status)
}

/** The gate that must be passed immediately before `gateId`, or null for the first */
export function predecessorOf(gateId: GateId): GateId | null {
  const index = GATE_ORDER.indexOf(gateId)
  return index > 0 ? (GATE_ORDER[index - 1] ?? null) : null
}
