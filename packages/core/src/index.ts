export * from "./model";
export * from "./errors";
export * from "./dataTypes";
export * from "./table";
export * from "./database";
export * from "./relations";
export * from "./render";
export * from "./xmlSource";
export * from "./config";
export * from "./analyze";
