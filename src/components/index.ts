export { Header } from './Header.tsx';
export { PrintProgress } from './PrintProgress.tsx';
export { ConnectionStatus, type ConnectionStep } from './ConnectionStatus.tsx';
export { App } from './App.tsx';
