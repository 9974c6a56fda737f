export * from "./core/config.js"
export * from "./core/date-format.js"
export * from "./core/decode-array.js"
export * from "./core/decode.js"
export * from "./core/encode.js"
export * from "./core/errors.js"
export * from "./core/json.js"
export * from "./core/target.js"
export * from "./core/transforms.js"
export * from "./shell/document.js"
export * from "./shell/options.js"
