export * from "./component.js";
export * from "./components/cardComponent.js";
export * from "./components/descriptionComponent.js";
export * from "./components/jumbotronComponent.js";
export * from "./components/scrollViewHorizontalComponent.js";
export * from "./entrypoint.js";
export * from "./errors.js";
export * from "./identity.js";
export * from "./section.js";
export * from "./visibility.js";
