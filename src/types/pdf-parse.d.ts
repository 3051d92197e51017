// The package entry runs a debug self-test when loaded from an ES module, so
// the library file is imported directly; it has the entry's typings.
declare module 'pdf-parse/lib/pdf-parse.js' {
  import pdf from 'pdf-parse';
  export default pdf;
}
