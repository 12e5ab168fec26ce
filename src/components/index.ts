export { Header } from './Header.tsx';
export { Status } from './Status.tsx';
export { ConnectionStatus, type ConnectionStep } from './ConnectionStatus.tsx';
export { StatusApp } from './StatusApp.tsx';
