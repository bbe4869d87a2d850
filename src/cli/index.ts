import { run } from './createProgram'

void run(process.argv)
