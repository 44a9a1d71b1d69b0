export * from "./collection-driver.contract";
export * from "./document.contract";
export * from "./operations.contract";
