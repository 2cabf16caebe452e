export {
  runAudit,
  runDedupe,
  runFullPipeline,
  runGuideExtraction,
  runPlaylistExtraction,
  runReconciliation,
  runValidation,
  type FullPipelineData,
  type PipelineDeps,
  type StageResult,
} from './pipeline';
export {
  COMMANDS,
  EXIT_LOAD_ERROR,
  EXIT_OK,
  EXIT_USAGE,
  isCommand,
  runCommand,
  usage,
  type Command,
  type Writer,
} from './commands';
