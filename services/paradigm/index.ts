export { ParadigmSchema, PARAMETER_KINDS, isParameterKind } from './ParadigmSchema';
export type { ParameterDeclaration, ParameterKind, ParameterOptions, SchemaDefinition } from './ParadigmSchema';
export { Paradigm } from './Paradigm';
export type { ParadigmChangeListener, ParadigmJSON } from './Paradigm';
export {
  formatFromPath,
  loadParadigmFile,
  paradigmFromDocument,
  paradigmToDocument,
  parseParadigmSource,
  saveParadigmFile,
  serializeParadigm
} from './paradigm-file';
export type { ParadigmFileFormat } from './paradigm-file';
