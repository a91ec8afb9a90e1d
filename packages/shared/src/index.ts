// Request schemas and quoting shared by the HTTP server and the CLI.

export * from './schemas/index'
export * from './quotes'
