/**
 * Output verbosity shared by every module that logs
 */
export enum Verbosity {
  Quiet = 0,
  Normal = 1,
  Verbose = 2,
}
