export * from './lambda'
export * from './rotation-function'
