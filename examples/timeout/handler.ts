import { createHandler } from '../../src/lambda'
import { runner } from './runner'

export const handler = createHandler(runner)
