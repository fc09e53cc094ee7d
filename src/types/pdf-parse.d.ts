// pdf-parse's package entry runs a debug self-test when loaded as the main
// module; the library file underneath exports the same function.
declare module 'pdf-parse/lib/pdf-parse.js' {
    import pdfParse from 'pdf-parse';
    export default pdfParse;
}
