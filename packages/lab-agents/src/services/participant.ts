import type { LabPhase, RoleConfig, Turn } from '@research-lab/shared'
import type { Transcript } from './transcript'

// Everything an agent learns about orchestrator state arrives through this text
export type TaskContext = {
  runId: string
  iteration: number
  phase: LabPhase
  brief: string
}

export interface TurnGenerator {
  generate(role: RoleConfig, transcript: Transcript, context: TaskContext): Promise<Turn>
}

export interface Participant {
  readonly role: RoleConfig
  takeTurn(transcript: Transcript, context: TaskContext): Promise<Turn>
}

export function createAgentParticipant(role: RoleConfig, generator: TurnGenerator): Participant {
  return {
    role,
    takeTurn: (transcript, context) => generator.generate(role, transcript, context)
  }
}
