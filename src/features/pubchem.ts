import { isFiniteNumber, isRecord, isString } from '../utils/guards.js';
import { HttpError, fetchJson, type FetchLike } from '../utils/http.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('pubchem');

const PUG_REST = 'https://pubchem.ncbi.nlm.nih.gov/rest/pug';
const PROPERTIES = ['IUPACName', 'IsomericSMILES', 'MolecularFormula', 'MolecularWeight'] as const;

/** 一意なものから順に試す */
export const NAMESPACES = ['cid', 'inchi', 'inchikey', 'smiles', 'name'] as const;

export type Namespace = (typeof NAMESPACES)[number];

export interface Compound {
  cid: number;
  iupacName: string | null;
  isomericSmiles: string | null;
  formula: string | null;
  weight: string | null;
}

export interface CompoundMatch {
  compound: Compound;
  namespace: Namespace;
}

const SUBSCRIPTS = '₀₁₂₃₄₅₆₇₈₉';

export function subscriptDigits(formula: string): string {
  return formula.replace(/[0-9]/g, (digit) => SUBSCRIPTS[Number(digit)] ?? digit);
}

export function compoundUrl(cid: number): string {
  return `https://pubchem.ncbi.nlm.nih.gov/compound/${cid}`;
}

export function structureImageUrl(cid: number): string {
  return `${PUG_REST}/compound/cid/${cid}/PNG`;
}

function optionalText(value: unknown): string | null {
  if (isString(value)) return value;
  if (isFiniteNumber(value)) return String(value);
  return null;
}

export function parseProperties(data: unknown): Compound | null {
  const table = isRecord(data) ? data['PropertyTable'] : undefined;
  const properties = isRecord(table) ? table['Properties'] : undefined;
  if (!Array.isArray(properties)) return null;
  const first: unknown = properties[0];
  if (!isRecord(first)) return null;
  const cid = first['CID'];
  if (!isFiniteNumber(cid)) return null;
  return {
    cid,
    iupacName: optionalText(first['IUPACName']),
    isomericSmiles: optionalText(first['IsomericSMILES']),
    formula: optionalText(first['MolecularFormula']),
    weight: optionalText(first['MolecularWeight']),
  };
}

/**
 * Embed body lines: the compound page, a blank line, then one entry per property.
 * Values longer than 20 characters go on their own line.
 */
export function compoundInfoLines(compound: Compound): string[] {
  const info: Array<[string, string]> = [
    ['IUPAC Name', compound.iupacName ?? 'N/A'],
    ['Isomeric SMILES', compound.isomericSmiles ?? 'N/A'],
    ['Mol. Formula', compound.formula === null ? 'N/A' : subscriptDigits(compound.formula)],
    ['Mol. Weight', compound.weight ?? 'N/A'],
  ];
  const lines = [compoundUrl(compound.cid), ''];
  for (const [key, value] of info) {
    lines.push(Array.from(value).length > 20 ? `**${key}:**\n\`${value}\`` : `**${key}:** \`${value}\``);
  }
  return lines;
}

export class PubChemClient {
  private fetch: FetchLike | undefined;

  constructor(fetch?: FetchLike) {
    this.fetch = fetch;
  }

  private async lookup(namespace: Namespace, query: string): Promise<Compound | null> {
    const url = `${PUG_REST}/compound/${namespace}/${encodeURIComponent(query)}/property/${PROPERTIES.join(',')}/JSON`;
    try {
      return parseProperties(await fetchJson(url, { fetch: this.fetch, retry: { maxRetries: 1 } }));
    } catch (error) {
      // 400 と 404 はこの名前空間で見つからなかっただけ
      if (error instanceof HttpError && (error.status === 400 || error.status === 404)) return null;
      throw error;
    }
  }

  /**
   * First match across NAMESPACES, or null when nothing matched
   */
  async search(query: string): Promise<CompoundMatch | null> {
    for (const namespace of NAMESPACES) {
      if (namespace === 'cid' && !/^\d+$/.test(query.trim())) continue;
      const compound = await this.lookup(namespace, query.trim());
      if (compound) {
        log.info(`PubChem query "${query}" matched CID ${compound.cid} by ${namespace}`);
        return { compound, namespace };
      }
    }
    log.info(`PubChem query "${query}" pulled no results`);
    return null;
  }
}
