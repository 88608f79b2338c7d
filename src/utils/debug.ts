/**
 * Debug logging utilities
 * Only logs when LHD_RETRIEVE_DEBUG=1 is set
 */

let warningsSilenced = false;

/**
 * Debug logging helper for module errors
 * @param moduleName - Name of the module (e.g., 'fsx', 'retriever')
 * @param functionName - Name of the function that encountered the error
 * @param context - Additional context to log (file paths, error details, etc.)
 */
export function debugError(
  moduleName: string,
  functionName: string,
  context: Record<string, unknown>
): void {
  if (process.env.LHD_RETRIEVE_DEBUG === '1') {
    console.error(`[lhd-retrieve][DEBUG] ${moduleName}.${functionName} error:`, context);
  }
}

/**
 * Report a non-fatal condition on stderr
 */
export function warn(message: string): void {
  if (warningsSilenced) return;
  console.error(`⚠️  ${message}`);
}

/**
 * Toggle warning output (used by --quiet)
 */
export function setWarningsSilenced(silenced: boolean): void {
  warningsSilenced = silenced;
}
