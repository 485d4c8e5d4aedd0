export { createPrimGenerator, PrimGenerator } from "./generator";
