export * from "./tpcds/index.js";
