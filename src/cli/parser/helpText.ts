/**
 * Help text for CLI commands
 */

export function getMainHelp(): string {
  return `
╭─────────────────────────────────────────────────╮
│  lhd-retrieve - LHD diagnostic data retrieval   │
│  Runs Retrieve.exe and reads what it writes     │
╰─────────────────────────────────────────────────╯

USAGE:
  lhd-retrieve fetch <diag> <shot> <subshot> <channel> [options]
                                         Retrieve one channel
  lhd-retrieve batch <diag> <subshot> --shots <list> --channels <list>
                                         Retrieve channels for several shots
  lhd-retrieve env [--json]              Check Windows/WSL and Retrieve.exe
  lhd-retrieve example [diag shot subshot channel]
                                         Print an example Retrieve command
  lhd-retrieve clean [dir] [options]     Remove leftover temporary files
  lhd-retrieve init [dir] [options]      Write .lhd-retrieve/config.json

OPTIONS:
  -v, --version                       Show version number
  -h, --help                          Show this help

EXAMPLES:
  lhd-retrieve fetch Mag 139400 1 32 -T
    Show a summary of magnetics channel 32 with its time axis

  lhd-retrieve fetch Mag 139400 1 32 -T --out mag_coil_32.csv
    Save the channel as CSV

  lhd-retrieve batch Mag 1 --shots 139400,139401 --channels 32,33,34
    Save data/shot_<shot>/<channel>.csv and a summary per shot

For detailed help on a specific command, run:
  lhd-retrieve fetch --help
  lhd-retrieve batch --help
  lhd-retrieve clean --help
  lhd-retrieve init --help
  `;
}

export function getFetchHelp(): string {
  return `
╭─────────────────────────────────────────────────╮
│  lhd-retrieve fetch - Retrieve one channel      │
╰─────────────────────────────────────────────────╯

USAGE:
  lhd-retrieve fetch <diag> <shot> <subshot> <channel> [options]

ARGUMENTS:
  <diag>                              Diagnostic name (e.g. Mag, Magnetics)
  <shot>                              Shot number
  <subshot>                           Sub-shot number (usually 1)
  <channel>                           Channel number or signal name

OPTIONS:
  -T, --time-axis                     Ask Retrieve.exe for the time axis
  -f, --frame <n>                     Retrieve a single frame
  -V, --voltage-conversion            Ask Retrieve.exe to convert to volts
  --dtype <type>                      Sample type of the .dat file
                                      int8|uint8|int16|uint16|int32|uint32|float32|float64
                                      (default: int16)
  --calibrated                        Export data * VResolution + VOffset
  -o, --out <file>                    Write the signal to a file
  --format <format>                   csv|json|ndjson (default: from extension, else csv)
  --retrieve-path <path>              Retrieve.exe or its directory
  --working-dir <dir>                 Directory for Retrieve.exe output files
  --timeout <ms>                      Per-call timeout (default: 300000)
  -q, --quiet                         Minimal output
  -h, --help                          Show this help

EXAMPLES:
  lhd-retrieve fetch Mag 139400 1 32 -T
  lhd-retrieve fetch Mag 139400 1 32 -T --calibrated --out coil32_volts.json
  `;
}

export function getBatchHelp(): string {
  return `
╭─────────────────────────────────────────────────╮
│  lhd-retrieve batch - Several shots & channels  │
╰─────────────────────────────────────────────────╯

USAGE:
  lhd-retrieve batch <diag> <subshot> --shots <list> --channels <list> [options]

OPTIONS:
  --shots <a,b,...>                   Shot numbers
  --channels <x,y,...>                Channel numbers or signal names
  -o, --out-dir <dir>                 Output directory (default: data)
  --no-time-axis                      Do not pass -T to Retrieve.exe
  --retrieve-path <path>              Retrieve.exe or its directory
  --working-dir <dir>                 Directory for Retrieve.exe output files
  --timeout <ms>                      Per-call timeout (default: 300000)
  -q, --quiet                         Minimal output
  -h, --help                          Show this help

OUTPUT:
  <out-dir>/shot_<shot>/<channel>.csv
  <out-dir>/shot_<shot>/summary.csv

NOTES:
  • Shots and channels are retrieved one after another
  • A channel that fails is reported and skipped
  `;
}

export function getCleanHelp(): string {
  return `
╭─────────────────────────────────────────────────╮
│  lhd-retrieve clean - Remove temporary files    │
╰─────────────────────────────────────────────────╯

USAGE:
  lhd-retrieve clean [dir] [options]

ARGUMENTS:
  [dir]                               Directory to clean
                                      (default: configured working directory)

OPTIONS:
  --all                               Include all temporary files in deletion
  --yes, -y                           Confirm deletion (required with --all)
  --quiet, -q                         Minimal output
  -h, --help                          Show this help

BEHAVIOR:
  • Default (dry run): lists retrieve_*.dat|.prm|.time|.tprm|.tmp files
  • With --all --yes: deletes them
  `;
}

export function getInitHelp(): string {
  return `
╭─────────────────────────────────────────────────╮
│  lhd-retrieve init - Project configuration      │
╰─────────────────────────────────────────────────╯

USAGE:
  lhd-retrieve init [dir] [options]

OPTIONS:
  --retrieve-path <path>              Retrieve.exe or its directory
  --working-dir <dir>                 Directory for Retrieve.exe output files
  --timeout <ms>                      Per-call timeout
  --format <format>                   Default export format: csv|json|ndjson
  -h, --help                          Show this help

ENVIRONMENT:
  LHD_RETRIEVE_PATH, LHD_RETRIEVE_WORKDIR and LHD_RETRIEVE_TIMEOUT override
  the config file. LHD_RETRIEVE_DEBUG=1 prints debug details.
  `;
}

export function getEnvHelp(): string {
  return `
USAGE:
  lhd-retrieve env [--json]

Reports the OS, WSL detection and where Retrieve.exe was found.
  `;
}

export function getExampleHelp(): string {
  return `
USAGE:
  lhd-retrieve example [diag] [shot] [subshot] [channel]

Prints the Retrieve command line for the given arguments
(default: Mag 139400 1 32).
  `;
}
