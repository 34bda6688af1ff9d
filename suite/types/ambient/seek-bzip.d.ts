// suite/types/ambient/seek-bzip.d.ts
declare module 'seek-bzip' {
  const Bunzip: {
    decode(input: Uint8Array, output?: Uint8Array): Buffer;
  };
  export = Bunzip;
}
