import { MATRIX_SYNTAX_RULES, formatMatrix, parseMatrix, rref } from '../../features/matrix.js';
import { offerRemoval, sendableChannel } from '../interactive.js';
import type { CommandDefinition } from '../types.js';

/**
 * %rref の返信本文
 */
export function rrefReply(userName: string, expression: string): string {
  const parsed = parseMatrix(expression);
  if (!parsed.ok) {
    return `⚠ **${userName}**, ${parsed.error}\n${MATRIX_SYNTAX_RULES}`;
  }
  return [
    `**${userName}**, you inputted the matrix:`,
    `\`\`\`${formatMatrix(parsed.matrix)}\`\`\``,
    'The reduced row-echelon form of this matrix is:',
    `\`\`\`${formatMatrix(rref(parsed.matrix))}\`\`\``,
  ].join('');
}

export function mathematicsCommands(): CommandDefinition[] {
  return [
    {
      name: 'rref',
      aliases: ['gaussjordan'],
      description: 'Calculates the reduced row-echelon form of a matrix',
      usage: 'rref <row> % <row> % ...',
      group: 'Mathematics',
      async execute(ctx) {
        const reply = rrefReply(ctx.message.author.username, ctx.rawArgs);
        const sent = await sendableChannel(ctx.message).send(reply);
        if (!reply.startsWith('⚠')) offerRemoval(sent, ctx.message.author.id);
      },
    },
  ];
}
