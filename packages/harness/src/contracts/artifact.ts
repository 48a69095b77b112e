/**
 * Contract artifacts.
 *
 * Writes a contract source file for publishcontract from the template in
 * `templates/contract.lua`. Variants append deliberately broken or padded
 * code for negative tests.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

export type ArtifactVariant = 'default' | 'syntax_err' | 'trim_code';

export const ARTIFACT_FILE_NAME = 'contract.lua';

const TEMPLATE_PATH = fileURLToPath(new URL('../../templates/contract.lua', import.meta.url));

export function renderContractSource(variant: ArtifactVariant = 'default'): string {
  const template = fs.readFileSync(TEMPLATE_PATH, 'utf8');
  switch (variant) {
    case 'syntax_err':
      return template + 'syntax_err';
    case 'trim_code':
      return template + '--1'.repeat(10);
    case 'default':
      return template;
  }
}

/**
 * Write the artifact into `dir` (a fresh temp dir when omitted) and return
 * its path.
 */
export function writeContractArtifact(dir?: string, variant: ArtifactVariant = 'default'): string {
  const folder = dir ?? fs.mkdtempSync(path.join(os.tmpdir(), 'contract_'));
  fs.mkdirSync(folder, { recursive: true });
  const filePath = path.join(folder, ARTIFACT_FILE_NAME);
  fs.writeFileSync(filePath, renderContractSource(variant), 'utf8');
  return filePath;
}
