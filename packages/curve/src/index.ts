export * from './hilbert';
export * from './hilbert-big';
export * from './curve';
