export { Storage, defaultStorageRoot } from "./storage";
