export { CorpusDescriptor } from "./corpus-descriptor";
export { StringRegistry } from "./string-registry";
