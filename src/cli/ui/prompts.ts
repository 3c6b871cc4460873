/**
 * Interactive prompts wrapper
 */

import * as p from "@clack/prompts";

/**
 * Ask before deleting backup directories. Cancelling counts as a no.
 */
export async function confirmDeletion(dirs: string[]): Promise<boolean> {
  const answer = await p.confirm({
    message: `Delete ${dirs.length} backup(s)?`,
    initialValue: false,
  });
  // a cancelled prompt resolves to clack's cancel symbol
  return answer === true;
}
