export * from "./errors";
export * from "./exchange";
export * from "./jwks";
export * from "./requests";
