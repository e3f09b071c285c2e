export const CLI_NAME = "copilot-money-cli";
export const CLI_VERSION = "0.1.0";
