// Type declarations for the parts of jstat netsynth uses (jstat ships no types)

declare module 'jstat' {
  export interface JStatStatic {
    mean(data: number[]): number;
    min(data: number[]): number;
    max(data: number[]): number;
    /** flag = true gives the sample (n - 1) standard deviation */
    stdev(data: number[], flag?: boolean): number;
    /** Sample quantiles; alphap = betap = 1 is linear interpolation (type 7) */
    quantiles(data: number[], quantiles: number[], alphap?: number, betap?: number): number[];
    corrcoeff(x: number[], y: number[]): number;
    lognormal: {
      pdf(x: number, mu: number, sigma: number): number;
      cdf(x: number, mu: number, sigma: number): number;
      inv(p: number, mu: number, sigma: number): number;
    };
  }

  const jStat: JStatStatic;
  export default jStat;
}
