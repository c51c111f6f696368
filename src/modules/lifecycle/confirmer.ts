/**
 * Confirmer: how human gates and confirmed edges ask the operator.
 *
 * A confirmation is an unbounded wait: implementations must not time out.
 */

export interface Confirmer {
  confirm(question: string): Promise<boolean>
}

/** Answers yes to everything; backs the CLI's --yes flag */
export class AutoConfirmer implements Confirmer {
  async confirm(_question: string): Promise<boolean> {
    return true
  }
}
