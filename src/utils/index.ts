export * from './TagInspector';
export * from './waitUntil';
export * from './pages';
