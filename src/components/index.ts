export { Header } from './Header.tsx';
export { TaskProgress } from './TaskProgress.tsx';
export { StepStatus, type TaskStep } from './StepStatus.tsx';
export { SuperblockSummary } from './SuperblockSummary.tsx';
export { SeedReport } from './SeedReport.tsx';
export { CreateApp } from './CreateApp.tsx';
export { InflateApp } from './InflateApp.tsx';
export { InspectApp } from './InspectApp.tsx';
