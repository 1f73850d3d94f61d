/**
 * Per-role startup instructions.
 *
 * The text only names the role and points the assistant at the shared
 * instruction document; the document itself is never read here.
 */

import type { Role } from './roles.js';

export const DEFAULT_INSTRUCTION_TEMPLATE =
  'You are {role}. Read {instructionFile} and follow the instructions for your role.';

export type InstructionRenderer = (role: Role) => string;

export function createInstructionRenderer(
  template: string = DEFAULT_INSTRUCTION_TEMPLATE,
  instructionFile: string = 'CLAUDE.md'
): InstructionRenderer {
  return (role) =>
    template.replace(/\{(role|instructionFile)\}/g, (_match, key: string) =>
      key === 'role' ? role : instructionFile
    );
}
