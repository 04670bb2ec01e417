export const CLI_NAME = "pay-probe";
export const VERSION = "0.1.0";
