/**
 * Interaction Controller
 *
 * Owns every decision the extraction engine cannot make on its own. In
 * interactive runs it asks through a Prompter; otherwise it answers with
 * the conservative defaults. The engine never reads the terminal itself.
 *
 * States: idle -> awaiting-single-entry | awaiting-overwrite | awaiting-recursion -> idle
 */

import type { SingleEntryDisposition } from '../types/config';
import type { Logger } from '../utils/logger';
import type { Prompter, PromptQuestion } from '../utils/prompt';

export type InteractionState =
  | { kind: 'idle' }
  | { kind: 'awaiting-single-entry'; archive: string; entry: string }
  | { kind: 'awaiting-overwrite'; archive: string; target: string }
  | { kind: 'awaiting-recursion'; archive: string };

/** What to do when the destination name is taken */
export type CollisionChoice = 'suffix' | 'overwrite' | 'skip';

/**
 * Whether nested archives found without --recursive are extracted.
 * always and never hold for the rest of the run.
 */
export type RecursionChoice = 'always' | 'once' | 'not-now' | 'never';

export interface InteractionOptions {
  interactive: boolean;
  /** Fixed single-entry answer from --one or PEEL_ONE_ENTRY */
  oneEntry?: SingleEntryDisposition;
}

export interface SingleEntryQuestion {
  archive: string;
  entry: string;
  entryType: 'file' | 'directory';
  baseName: string;
}

export interface RecursionQuestion {
  archive: string;
  /** Nested archives, as shown to the user */
  nested: readonly string[];
  /** Files in the extracted output, nested archives included */
  fileCount: number;
}

const SINGLE_ENTRY_ANSWERS: Record<string, SingleEntryDisposition> = {
  i: 'inside',
  r: 'rename',
  h: 'here',
};

const COLLISION_ANSWERS: Record<string, CollisionChoice> = {
  s: 'suffix',
  o: 'overwrite',
  k: 'skip',
};

const RECURSION_ANSWERS: Record<string, RecursionChoice | 'list'> = {
  a: 'always',
  o: 'once',
  n: 'not-now',
  v: 'never',
  l: 'list',
};

/** Nested archives must make up more than one file in this many before asking */
const RECURSION_RATIO = 10;

/** Invalid answers are asked again at most this many times before the default applies */
const MAX_ATTEMPTS = 5;

export class InteractionController {
  private current: InteractionState = { kind: 'idle' };
  private permanentSingleEntry: SingleEntryDisposition | undefined;
  private permanentRecursion: 'always' | 'never' | undefined;

  constructor(
    private readonly options: InteractionOptions,
    private readonly prompter: Prompter | null,
    private readonly logger: Logger
  ) {
    this.permanentSingleEntry = options.oneEntry;
  }

  get state(): InteractionState {
    return this.current;
  }

  private get canAsk(): boolean {
    return this.options.interactive && this.prompter !== null;
  }

  /**
   * Decide where a lone top-level entry goes. An uppercase answer applies
   * to every later archive in the run.
   */
  async resolveSingleEntry(question: SingleEntryQuestion): Promise<SingleEntryDisposition> {
    if (this.permanentSingleEntry) return this.permanentSingleEntry;
    if (!this.canAsk) return 'inside';

    this.current = {
      kind: 'awaiting-single-entry',
      archive: question.archive,
      entry: question.entry,
    };
    try {
      const { entryType, baseName } = question;
      const answer = await this.askUntilValid(
        {
          lines: [
            `${question.archive} contains one ${entryType} but its name doesn't match.`,
            ` Expected: ${baseName}`,
            `   Actual: ${question.entry}`,
          ],
          choices: [
            `extract the ${entryType} _I_nside a new directory named ${baseName}`,
            `extract the ${entryType} and _R_ename it ${baseName}`,
            `extract the ${entryType} _H_ere`,
            'answer in capitals (I/R/H) to use that choice for the rest of this run',
          ],
          prompt: 'What do you want to do?  (I/r/h) ',
        },
        SINGLE_ENTRY_ANSWERS,
        'inside'
      );
      if (answer.permanent) this.permanentSingleEntry = answer.value;
      return answer.value;
    } finally {
      this.current = { kind: 'idle' };
    }
  }

  /**
   * Decide what happens when `target` already exists. Without a prompt the
   * numeric-suffix policy applies.
   */
  async resolveCollision(archive: string, target: string): Promise<CollisionChoice> {
    if (!this.canAsk) return 'suffix';

    this.current = { kind: 'awaiting-overwrite', archive, target };
    try {
      const answer = await this.askUntilValid(
        {
          lines: [`${archive}: ${target} already exists.`],
          choices: [
            'extract under a new _S_uffixed name',
            `_O_verwrite ${target}, merging into it`,
            '_K_eep it and skip this archive',
          ],
          prompt: 'What do you want to do?  (S/o/k) ',
        },
        COLLISION_ANSWERS,
        'suffix'
      );
      return answer.value;
    } finally {
      this.current = { kind: 'idle' };
    }
  }

  /**
   * Decide whether to extract the nested archives of an archive extracted
   * without --recursive. Only asks when they are a sizeable share of the
   * output; answering "list" shows them and asks again.
   */
  async resolveRecursion(question: RecursionQuestion): Promise<RecursionChoice> {
    if (this.permanentRecursion) return this.permanentRecursion;
    const { archive, nested, fileCount } = question;
    if (!this.canAsk || nested.length * RECURSION_RATIO <= fileCount) return 'not-now';

    this.current = { kind: 'awaiting-recursion', archive };
    try {
      const summary =
        `${archive} contains ${nested.length} other archive file(s), ` +
        `out of ${fileCount} file(s) total.`;
      let lines = [summary];
      for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
        const answer = await this.askUntilValid(
          {
            lines,
            choices: [
              '_A_lways extract included archives during this run',
              'extract included archives this _O_nce',
              'choose _N_ot to extract included archives this once',
              'ne_V_er extract included archives during this run',
              '_L_ist included archives',
            ],
            prompt: 'What do you want to do?  (a/o/N/v/l) ',
          },
          RECURSION_ANSWERS,
          'not-now'
        );
        if (answer.value === 'list') {
          lines = [summary, ...nested];
          continue;
        }
        if (answer.value === 'always' || answer.value === 'never') {
          this.permanentRecursion = answer.value;
        }
        return answer.value;
      }
      return 'not-now';
    } finally {
      this.current = { kind: 'idle' };
    }
  }

  private async askUntilValid<T>(
    question: PromptQuestion,
    answers: Record<string, T>,
    fallback: T
  ): Promise<{ value: T; permanent: boolean }> {
    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      const raw = this.prompter ? await this.prompter.ask(question) : null;
      if (raw === null) return { value: fallback, permanent: false };

      const trimmed = raw.trim();
      if (trimmed === '') return { value: fallback, permanent: false };

      const value = answers[trimmed.toLowerCase()];
      if (value !== undefined) {
        const permanent = trimmed.length === 1 && trimmed !== trimmed.toLowerCase();
        return { value, permanent };
      }
      this.logger.warn(`unrecognized answer "${trimmed}"`);
    }
    return { value: fallback, permanent: false };
  }
}
