import path from 'path'
import os from 'os'

export const resolvePath = <P extends string | undefined>(p: P) => {
  if (!p || path.isAbsolute(p)) {
    return p
  }

  return path.resolve(p)
}

export const getDefaultKubeconfigPath = (homeDir: string = os.homedir()) =>
  homeDir ? path.join(homeDir, '.kube', 'config') : undefined
