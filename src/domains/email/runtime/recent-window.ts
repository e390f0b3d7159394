/**
 * @fileoverview Per-turn snapshot of the email list that 1-based indexes refer to.
 *
 * The first listing tool of a turn captures its ordered ids. get_email_details
 * resolves against that capture; with nothing captured it fetches the most
 * recent emails and captures those instead.
 */

import type { Email, MailClient } from '../types.js';

/** Size of the fallback recent listing. */
export const RECENT_WINDOW_SIZE = 20;

export type WindowLookup =
  | { found: true; email: Email }
  | { found: false; size: number };

export class RecentWindow {
  private ids: readonly string[] | null = null;

  get captured(): boolean {
    return this.ids !== null;
  }

  get size(): number {
    return this.ids?.length ?? 0;
  }

  /**
   * Capture an ordered id list. Only the first non-empty capture sticks.
   */
  capture(ids: readonly string[]): void {
    if (this.ids === null && ids.length > 0) {
      this.ids = [...ids];
    }
  }

  /**
   * Resolve a 1-based index to an email.
   */
  async lookup(index: number, mail: MailClient): Promise<WindowLookup> {
    if (this.ids === null) {
      const emails = await mail.getRecentEmails(RECENT_WINDOW_SIZE);
      this.capture(emails.map((email) => email.id));
      const email = emails[index - 1];
      return index >= 1 && email ? { found: true, email } : { found: false, size: emails.length };
    }

    const id = this.ids[index - 1];
    if (index < 1 || id === undefined) {
      return { found: false, size: this.ids.length };
    }
    return { found: true, email: await mail.getMessage(id) };
  }
}
