export { loadConfig } from "./loadConfig";
