export * from "./instantiator/index.js";
