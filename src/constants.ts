export const CLI_NAME = "grape";

export const MINUTES_PER_DAY = 24 * 60;

export const CONSOLIDATED_BASENAME = "24_hour_10sps_iq";

export const SERVICE_NAME = "grape-watchdog";
