/**
 * Confirmer backed by a terminal prompt.
 *
 * `--yes` answers every question; without a TTY every question is
 * declined, so scripted runs never hang on a prompt.
 */

import * as readline from 'readline'
import type { Confirmer } from '../../modules/lifecycle/confirmer.js'
import { AutoConfirmer } from '../../modules/lifecycle/confirmer.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('confirmer')

export class ReadlineConfirmer implements Confirmer {
  constructor(
    private readonly _input: NodeJS.ReadableStream = process.stdin,
    private readonly _output: NodeJS.WritableStream = process.stdout,
  ) {}

  confirm(question: string): Promise<boolean> {
    return new Promise((resolve) => {
      const rl = readline.createInterface({ input: this._input, output: this._output })
      // Input closed before an answer (EOF) counts as a decline
      rl.on('close', () => resolve(false))
      rl.question(`${question} [y/N] `, (answer) => {
        const normalised = answer.trim().toLowerCase()
        resolve(normalised === 'y' || normalised === 'yes')
        rl.close()
      })
    })
  }
}

/** Declines everything; used when stdin is not a terminal */
export class NonInteractiveConfirmer implements Confirmer {
  async confirm(question: string): Promise<boolean> {
    logger.info({ question }, 'No terminal to confirm on; declining (pass --yes to confirm)')
    return false
  }
}

export interface ConfirmerChoice {
  yes?: boolean
  /** Override for testing */
  isTTY?: boolean
}

export function createCliConfirmer(choice: ConfirmerChoice): Confirmer {
  if (choice.yes === true) return new AutoConfirmer()
  const isTTY = choice.isTTY ?? process.stdin.isTTY
  return isTTY ? new ReadlineConfirmer() : new NonInteractiveConfirmer()
}
