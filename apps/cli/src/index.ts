// Interactive option pricer.
//
// Usage:
//   npm run cli            # prompts for the engine and every parameter
//   PRICER_MAX_PATHS=50000 npm run cli

import { createInterface } from 'node:readline/promises'
import { resolveLimits } from '@option-pricer/config'
import { runSession } from './session'

const rl = createInterface({ input: process.stdin, output: process.stdout })

try {
  process.exitCode = await runSession(
    (question) => rl.question(question),
    (line) => process.stdout.write(line + '\n'),
    resolveLimits(),
  )
} catch (err) {
  process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`)
  process.exitCode = 1
} finally {
  rl.close()
}
