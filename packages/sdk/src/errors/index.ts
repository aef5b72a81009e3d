export { BotwireError } from "./botwire-error";
export { ConfigurationError } from "./configuration-error";
