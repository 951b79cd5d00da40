// The package entry point runs a debug routine when loaded from ES modules; the library file does not.
declare module 'pdf-parse/lib/pdf-parse.js' {
  import pdfParse from 'pdf-parse';
  export default pdfParse;
}
