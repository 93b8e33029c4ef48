export * from "./entities/entry-id";
export * from "./entities/row";
