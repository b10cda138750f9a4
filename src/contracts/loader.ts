import { readFile } from 'fs/promises';
import { buildContractSpecification } from './definition.js';
import { ContractSpecificationError } from './types.js';
import type { ContractSpecification } from './types.js';
import { describeError, logger } from '../observability/logger.js';

export async function loadContractFile(path: string): Promise<ContractSpecification> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new ContractSpecificationError([
      { path: '', message: `cannot read contract file ${path}: ${describeError(error)}` },
    ]);
  }

  let input: unknown;
  try {
    input = JSON.parse(raw);
  } catch (error) {
    throw new ContractSpecificationError([
      { path: '', message: `contract file ${path} is not valid JSON: ${describeError(error)}` },
    ]);
  }

  const spec = buildContractSpecification(input);

  logger.info('contract_loaded', 'Contract specification loaded', {
    path,
    version: spec.version,
    role: spec.role,
    contractHash: spec.contract_hash,
  });

  return spec;
}
