export * from './consolidator';
export * from './merge';
export * from './assembly';
export * from './integrity';
export * from './toc';
export * from './validator';
export * from './hallucinations';
