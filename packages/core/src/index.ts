export * as Git from "./git";
export * as Inspector from "./repository_inspector";
export * as Override from "./override_recorder";
export * as Config from "./config_manager";
export * as Logger from "./logger";
