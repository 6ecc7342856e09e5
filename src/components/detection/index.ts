export { DetectionControls } from './DetectionControls';
export { DetectionIntroCard } from './DetectionIntroCard';
export { DetectionResultCard } from './DetectionResultCard';
export { DetectionViewport } from './DetectionViewport';
