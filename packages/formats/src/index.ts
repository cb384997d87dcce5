// @synteny/formats - format resolution for the file readers feeding the layout
export * from './config';
export * from './files';
export * from './reader';
