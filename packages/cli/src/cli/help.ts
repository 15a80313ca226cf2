/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
attrtrace - attribute access analysis for Python functions v${VERSION}

USAGE:
  attrtrace [options] <file>

GLOBAL OPTIONS:
  -h, --help                    Show help
  -v, --version                 Show version
  -V, --verbose                 Print progress to stderr
  -c, --config <file>           Config file path (default: nearest attrtrace.json)

ANALYSIS OPTIONS:
  -f, --follow-imports <0-3>    0 none, 1 local (default), 2 +installed packages,
                                3 +standard library
  -F, --exclude-import <regex>  Do not follow matching modules (repeatable)
  -x, --exclude <regex>         Do not analyse matching functions (repeatable)
  -S, --search-path <dir>       Extra directory searched for imports (repeatable)
  -P, --python <exe>            Interpreter whose sys.path is searched at
                                levels 2 and 3 (default: python3)
  --strict                      Fail on any error or warning in the target file
  --threshold <n>               Fail when the target file's badness exceeds n

OUTPUT OPTIONS:
  -o, --stdout <mode>           silent, ir, results (default) or stats
  -w, --warning-level <level>   none, local, default (default) or all
  -H, --collapse-home           Show the home directory as ~
  -T, --truncate-deep-paths     Show only the last three path segments

CACHE OPTIONS:
  -C, --cache-file <file>       Reuse results while no analysed file changed
  -r, --force-refresh-cache     Discard the cache before analysing

EXIT CODES:
  0  Success
  1  Fatal analysis error or threshold exceeded
  2  Usage error
  3  Configuration error

EXAMPLES:
  attrtrace app/models.py
  attrtrace -f 3 -o stats app/models.py
  attrtrace --threshold 5 -w local -C .attrtrace-cache.json app/models.py
`);
};
