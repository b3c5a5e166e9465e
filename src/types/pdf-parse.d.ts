// The package entry runs a self-test when loaded without a parent module;
// the library file underneath does not.
declare module 'pdf-parse/lib/pdf-parse.js' {
  import pdf = require('pdf-parse');
  export = pdf;
}
