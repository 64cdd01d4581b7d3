export { writeArtifact } from "./artifact-writer.js";
