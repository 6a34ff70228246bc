declare module 'double-metaphone' {
  function doubleMetaphone(value: string): [string, string];
  export = doubleMetaphone;
}
