declare module 'alea' {
  interface AleaPRNG {
    (): number;
  }

  function Alea(...seeds: Array<string | number>): AleaPRNG;

  export default Alea;
}
