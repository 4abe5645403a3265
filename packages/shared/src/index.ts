export * from './lab-run'
export * from './notebook'
export * from './roles'
export * from './run-config'
