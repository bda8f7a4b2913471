export * from "./model";
export * from "./errors";
export * from "./deckCatalog";
export * from "./players";
export * from "./round";
export * from "./actions";
export * from "./aggregate";
export * from "./view";
