export {
  type RecordingTarget,
  type RenderCall,
  createRecordingTarget,
  rowNames,
} from "./renderTarget.js";

export {
  type RecordingExecutor,
  type ScriptedSource,
  createRecordingExecutor,
  createScriptedSource,
} from "./collaborators.js";
