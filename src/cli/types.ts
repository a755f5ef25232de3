export enum OutputFormat {
  Line = 'line',
  Json = 'json',
}

/** Exit status of a batch interrupted by SIGINT. */
export const EXIT_CANCELLED = 130;
