import { compoundInfoLines, structureImageUrl, type CompoundMatch } from '../../features/pubchem.js';
import { makeEmbed, offerRemoval, sendEmbed, sendableChannel } from '../interactive.js';
import type { CommandServices } from '../services.js';
import type { CommandDefinition, EmbedSpec } from '../types.js';

export const PERIODIC_TABLE_URL =
  'https://upload.wikimedia.org/wikipedia/commons/thumb/0/03/Simple_Periodic_Table_Chart-blocks.svg/1920px-Simple_Periodic_Table_Chart-blocks.svg.png';

export function compoundEmbed(query: string, match: CompoundMatch): EmbedSpec {
  return {
    title: 'PubChem Search Result',
    description: compoundInfoLines(match.compound).join('\n'),
    color: 'green',
    image: structureImageUrl(match.compound.cid),
    footer: `Search type: ${match.namespace.toUpperCase()}\nQuery: "${query}"`,
  };
}

export function noResultsEmbed(userName: string, query: string): EmbedSpec {
  return makeEmbed(
    `⚠ **${userName}**, your query \`${query}\` pulled no results on [PubChem](https://pubchem.ncbi.nlm.nih.gov/)!`,
    undefined,
    'red',
  );
}

export function chemistryCommands(services: CommandServices): CommandDefinition[] {
  return [
    {
      name: 'periodictable',
      aliases: ['periodic', 'ptable'],
      description: 'Displays the periodic table of the chemical elements',
      group: 'Chemistry',
      async execute(ctx) {
        const sent = await sendEmbed(sendableChannel(ctx.message), {
          description: '',
          color: 'green',
          image: PERIODIC_TABLE_URL,
        });
        offerRemoval(sent);
      },
    },
    {
      name: 'pubchem',
      aliases: ['chem'],
      description: 'Searches PubChem and shows basic info about the first result',
      usage: 'pubchem <name, CID, SMILES, InChI or InChIKey>',
      group: 'Chemistry',
      async execute(ctx) {
        const channel = sendableChannel(ctx.message);
        const name = ctx.message.author.username;
        if (!ctx.rawArgs) {
          await sendEmbed(channel, makeEmbed(`⚠ **${name}**, tell me what to search for! Example: \`%pubchem caffeine\``, undefined, 'red'));
          return;
        }
        await channel.sendTyping();
        const match = await services.pubchem.search(ctx.rawArgs);
        if (!match) {
          await sendEmbed(channel, noResultsEmbed(name, ctx.rawArgs));
          return;
        }
        offerRemoval(await sendEmbed(channel, compoundEmbed(ctx.rawArgs, match)));
      },
    },
  ];
}
