/**
 * Command line construction for Retrieve.exe
 *
 * The archive client takes its arguments positionally:
 *
 *   Retrieve DiagName ShotNo SubShotNo ChNo-Name [FileName] [options]
 *
 * and writes `<FileName>*.dat`, `.prm` and (with -T) `.time` into its
 * working directory.
 */

/** Channel number or signal name */
export type Channel = number | string;

export interface RetrieveRequest {
  diagName: string;
  shot: number;
  subshot: number;
  channel: Channel;
  filePrefix?: string;
  options?: string[];
}

export interface RetrieveFlags {
  /** -T: have the tool write the .time file */
  timeAxis?: boolean;
  /** -f <n>: retrieve a single frame */
  frameNumber?: number;
  /** -V: have the tool convert raw counts to volts */
  voltageConversion?: boolean;
}

export const OUTPUT_EXTENSIONS = {
  data: '.dat',
  parameters: '.prm',
  time: '.time',
} as const;

/** Everything the tool may leave behind for one prefix */
export const TEMPORARY_EXTENSIONS = ['.dat', '.prm', '.time', '.tprm', '.tmp'] as const;

export const FILE_PREFIX_ROOT = 'retrieve_';

export function buildRetrieveOptions(flags: RetrieveFlags): string[] {
  const options: string[] = [];
  if (flags.timeAxis) {
    options.push('-T');
  }
  if (flags.frameNumber !== undefined) {
    options.push('-f', String(flags.frameNumber));
  }
  if (flags.voltageConversion) {
    options.push('-V');
  }
  return options;
}

/**
 * Arguments passed after the executable
 */
export function buildRetrieveArgs(request: RetrieveRequest): string[] {
  const args = [
    request.diagName,
    String(request.shot),
    String(request.subshot),
    String(request.channel),
  ];

  if (request.filePrefix) {
    args.push(request.filePrefix);
  }

  if (request.options && request.options.length > 0) {
    args.push(...request.options);
  }

  return args;
}

/**
 * Per-call file prefix, unique for one diagnostic/shot/channel
 */
export function makeFilePrefix(diagName: string, shot: number, subshot: number, channel: Channel): string {
  return `${FILE_PREFIX_ROOT}${diagName}_${shot}_${subshot}_${channel}`;
}

/**
 * Base name the tool uses when no file name argument is given
 */
export function defaultBaseName(diagName: string, shot: number, subshot: number, channel: Channel): string {
  return `${diagName}_${shot}_${subshot}_${channel}`;
}

export function formatCommandLine(executable: string, args: string[]): string {
  return [executable, ...args].join(' ');
}

export function createExampleRetrieval(
  diagName: string = 'Mag',
  shot: number = 139400,
  subshot: number = 1,
  channel: Channel = 32
): string {
  return `Retrieve ${diagName} ${shot} ${subshot} ${channel} -T`;
}
