/**
 * Params CLI Command
 * Lists the parameters a paradigm file declares
 */

import { loadParadigmFile } from '@services/paradigm/paradigm-file';

export class ParamsCommand {
  async execute(paradigmPath: string): Promise<string> {
    const paradigm = await loadParadigmFile(paradigmPath);
    return paradigm.formatParameterTable();
  }
}

export function createParamsCommand(): ParamsCommand {
  return new ParamsCommand();
}
