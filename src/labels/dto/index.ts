export * from './import-labels.dto';
export * from './label-arg.dto';
export * from './render-label.dto';
export * from './response.dto';
export * from './save-variant.dto';
