export const name = '@pacup/core';

export * from './config/loader';
export * from './pacscript/types';
export * from './pacscript/evaluator';
export * from './pacscript/internal-evaluator';
export * from './pacscript/parser';
export * from './pacscript/load';
export * from './version/types';
export * from './version/comparator';
export * from './version/resolver';
export * from './release-notes';
export * from './git/service';
export * from './update/collaborators';
export * from './update/download';
export * from './update/rewrite';
export * from './update/pipeline';
export * from './batch';
