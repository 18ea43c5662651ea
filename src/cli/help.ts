/**
 * @fileoverview Help text for the netmeta-mcp CLI
 */

export const HELP_TEXT = `
netmeta-mcp - Network meta-analysis tools over the Model Context Protocol

USAGE:
    netmeta-mcp [options]

With no options the server starts on stdio and waits for an MCP client.

OPTIONS:
    --r-path <path>     R executable to use (default: search beside node, then PATH)
    --state-dir <dir>   Directory for stored analyses (default: system temp dir)
    --timeout <ms>      Kill an R process after this many ms (0 = never, default)
    --check             Locate and verify R and its packages, print the result, exit
    -v, --version       Show version information
    -h, --help          Show this help

ENVIRONMENT:
    NETMETA_R_PATH      Same as --r-path
    NETMETA_STATE_DIR   Same as --state-dir
    NETMETA_TIMEOUT_MS  Same as --timeout
    NETMETA_LOG_LEVEL   debug | info | warn | error | silent (logs go to stderr)

EXAMPLES:
    netmeta-mcp --check
    netmeta-mcp --r-path /opt/R/4.3.2/bin/R --timeout 120000
`;

export function showHelp(): void {
  console.log(HELP_TEXT);
}
