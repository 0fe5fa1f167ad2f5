import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { PubChemClient, compoundInfoLines, parseProperties, subscriptDigits } from '../src/features/pubchem.js';
import type { FetchLike } from '../src/utils/http.js';
import './helpers/fakes.js';

const PUG = 'https://pubchem.ncbi.nlm.nih.gov/rest/pug/compound';
const PROPS = 'property/IUPACName,IsomericSMILES,MolecularFormula,MolecularWeight/JSON';

const table = {
  PropertyTable: {
    Properties: [{ CID: 2244, IUPACName: '2-acetyloxybenzoic acid', MolecularFormula: 'C9H8O4', MolecularWeight: 180.16 }],
  },
};

function stubFetch(matches: Record<string, unknown>): { fetch: FetchLike; urls: string[] } {
  const urls: string[] = [];
  return {
    urls,
    fetch: async (input) => {
      urls.push(input);
      const body = matches[input];
      return body === undefined ? new Response('bad', { status: 400 }) : Response.json(body);
    },
  };
}

describe('compound formatting', () => {
  it('subscripts formula digits', () => {
    assert.equal(subscriptDigits('C9H8O4'), 'C₉H₈O₄');
  });

  it('parses the first property row', () => {
    assert.deepEqual(parseProperties(table), {
      cid: 2244,
      iupacName: '2-acetyloxybenzoic acid',
      isomericSmiles: null,
      formula: 'C9H8O4',
      weight: '180.16',
    });
    assert.equal(parseProperties({ PropertyTable: { Properties: [] } }), null);
  });

  it('puts long values on their own line', () => {
    const compound = parseProperties(table);
    assert.ok(compound);
    assert.deepEqual(compoundInfoLines(compound), [
      'https://pubchem.ncbi.nlm.nih.gov/compound/2244',
      '',
      '**IUPAC Name:**\n`2-acetyloxybenzoic acid`',
      '**Isomeric SMILES:** `N/A`',
      '**Mol. Formula:** `C₉H₈O₄`',
      '**Mol. Weight:** `180.16`',
    ]);
  });
});

describe('PubChemClient', () => {
  it('tries namespaces in order until one matches', async () => {
    const { fetch, urls } = stubFetch({ [`${PUG}/name/aspirin/${PROPS}`]: table });
    const match = await new PubChemClient(fetch).search('aspirin');
    assert.equal(match?.namespace, 'name');
    assert.equal(match?.compound.cid, 2244);
    assert.deepEqual(urls, [
      `${PUG}/inchi/aspirin/${PROPS}`,
      `${PUG}/inchikey/aspirin/${PROPS}`,
      `${PUG}/smiles/aspirin/${PROPS}`,
      `${PUG}/name/aspirin/${PROPS}`,
    ]);
  });

  it('looks numbers up as CIDs first', async () => {
    const { fetch, urls } = stubFetch({ [`${PUG}/cid/2244/${PROPS}`]: table });
    assert.equal((await new PubChemClient(fetch).search(' 2244 '))?.namespace, 'cid');
    assert.equal(urls.length, 1);
  });

  it('returns null when nothing matches', async () => {
    const { fetch, urls } = stubFetch({});
    assert.equal(await new PubChemClient(fetch).search('nothing'), null);
    assert.equal(urls.length, 4);
  });
});
