export { CatalogService } from "./catalogService";
export type { CatalogServiceDeps } from "./catalogService";
export { createCatalogService } from "./createCatalogService";
export type { CatalogApp } from "./createCatalogService";
