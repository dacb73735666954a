// neo-blessed ships no typings; its API is blessed's.
declare module "neo-blessed" {
  import blessed = require("blessed");
  export = blessed;
}
