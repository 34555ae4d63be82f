export { maskAccessKeyId, redactSecret } from "./redact";
