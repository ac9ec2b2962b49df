import { fileURLToPath } from 'node:url';
import type { Principal } from '../src/domain/types.js';

export const SEED_FILE = fileURLToPath(new URL('./fixtures/users.json', import.meta.url));

/** fixtures/users.json の1件目 */
export const ada: Principal = {
  id: 1,
  identity: 'ada.quill@example.com',
  firstName: 'Ada',
  lastName: 'Quill',
  displayName: 'Ada Quill',
  capability: 'basic',
};

export type StageName = 'authorization' | 'safety' | 'sanitization' | 'combined' | 'fallback';

/** system instruction からステージを判別する（スクリプト化オラクル用） */
export const stageOf = (systemInstruction: string): StageName => {
  if (systemInstruction.startsWith('You review SQL')) return 'safety';
  if (systemInstruction.startsWith('You check assistant responses')) return 'sanitization';
  if (systemInstruction.includes('SQL reviewer')) return 'combined';
  if (systemInstruction.startsWith('You are a helpful assistant')) return 'fallback';
  return 'authorization';
};
