import { z } from 'zod'

/** Step names as Secrets Manager sends them to a rotation function. */
export const ROTATION_STEP_NAMES = {
  createSecret: 'create',
  setSecret: 'set',
  testSecret: 'test',
  finishSecret: 'finish',
} as const

export type RotationStepName = keyof typeof ROTATION_STEP_NAMES

export type RotationStep = (typeof ROTATION_STEP_NAMES)[RotationStepName]

export interface RotationEvent {
  /** Correlates the steps of one rotation; becomes the new version's id. */
  clientRequestToken: string
  secretId: string
  step: RotationStep
}

export const RotationEventSchema = z
  .object({
    ClientRequestToken: z.string().min(1),
    SecretId: z.string().min(1),
    Step: z.enum(['createSecret', 'setSecret', 'testSecret', 'finishSecret']),
  })
  .transform(
    (raw): RotationEvent => ({
      clientRequestToken: raw.ClientRequestToken,
      secretId: raw.SecretId,
      step: ROTATION_STEP_NAMES[raw.Step],
    }),
  )
