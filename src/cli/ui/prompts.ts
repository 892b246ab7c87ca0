import { confirm } from '@inquirer/prompts';

import { getActiveCancelSignal } from '../cancel.js';

export async function promptConfirm(message: string, defaultValue = false): Promise<boolean> {
  const signal = getActiveCancelSignal();
  return await confirm({ message, default: defaultValue }, signal ? { signal } : {});
}
