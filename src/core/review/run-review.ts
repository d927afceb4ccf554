import { InvalidIndexError, NotInteractiveError } from '../../shared/errors'
import type { ReviewAction } from '../../shared/types'
import type { Prompter } from './prompter'
import type { ReviewSession } from './review-session'

export const ACTION_PROMPT = 'confirm [Y]  edit list [E]  cancel [C]: '
export const INDEX_PROMPT = 'edit file number (ENTER to stop): '
export const NAME_PROMPT = 'new name (with extension; ENTER to clear): '

export type ReviewOutcome =
  | { action: 'confirm'; assignment: ReadonlyMap<string, string> }
  | { action: 'cancel' }

/** Map an answer to an action. End of input counts as cancel. */
export function parseAction(answer: string | null): ReviewAction | null {
  if (answer === null) return 'cancel'
  switch (answer.trim().toLowerCase()) {
    case 'y':
    case 'yes':
      return 'confirm'
    case 'e':
    case 'edit':
      return 'edit'
    case 'c':
    case 'cancel':
    case 'q':
      return 'cancel'
    default:
      return null
  }
}

function printSummary(session: ReviewSession, prompter: Prompter): void {
  prompter.print()
  for (const line of session.summary()) prompter.print(line)
  prompter.print()
}

/**
 * Ask for index/name pairs until the operator enters a blank index.
 */
async function editLoop(session: ReviewSession, prompter: Prompter): Promise<void> {
  for (;;) {
    const answer = await prompter.ask(INDEX_PROMPT)
    if (answer === null || answer.trim() === '') return

    let index: number
    try {
      index = session.parseIndex(answer)
    } catch (err) {
      if (err instanceof InvalidIndexError) {
        prompter.print('  invalid number')
        continue
      }
      throw err
    }

    const name = await prompter.ask(NAME_PROMPT)
    if (name === null) return
    session.edit(index, name)
  }
}

/**
 * Drive a review session to confirm or cancel. The summary is shown before
 * every top-level prompt, so it is redisplayed after each round of edits.
 *
 * @throws {NotInteractiveError} If the prompter has no operator behind it.
 */
export async function runReview(session: ReviewSession, prompter: Prompter): Promise<ReviewOutcome> {
  if (!prompter.interactive) {
    throw new NotInteractiveError()
  }

  for (;;) {
    printSummary(session, prompter)
    const action = parseAction(await prompter.ask(ACTION_PROMPT))

    if (action === 'confirm') {
      return { action, assignment: session.confirm() }
    }
    if (action === 'cancel') {
      session.cancel()
      return { action }
    }
    if (action === 'edit') {
      await editLoop(session, prompter)
    }
  }
}
