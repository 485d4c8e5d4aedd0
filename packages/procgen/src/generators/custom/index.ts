export { createOpenGridGenerator, OpenGridGenerator } from "./generator";
