// Human-readable status lines written to the output sink.

export const messages = {
  packageInstalling: (pkg: string) => `Installing '${pkg}'`,
  packageInstallSucceeded: (pkg: string) => `Successfully installed '${pkg}'`,
  packageInstallFailed: (pkg: string, exitCode: number) => `Failed to install '${pkg}' (exit code ${exitCode})`,

  packageUninstalling: (pkg: string) => `Uninstalling '${pkg}'`,
  packageUninstallSucceeded: (pkg: string) => `Successfully uninstalled '${pkg}'`,
  packageUninstallFailed: (pkg: string, exitCode: number) => `Failed to uninstall '${pkg}' (exit code ${exitCode})`,

  toolInstalling: (tool: string) => `Installing ${tool}`,
  toolInstallSucceeded: (tool: string) => `Successfully installed ${tool}`,
  toolInstallFailed: (tool: string, exitCode: number) => `Failed to install ${tool} (exit code ${exitCode})`,

  insecureOption: (version: string) => `Using '--insecure' option for Python ${version}.`,

  installToolPrompt: (tool: string) => `${tool} is not installed in this environment. Install it now?`,
  installPackagePrompt: (pkg: string) => `'${pkg}' is not installed. Install it now?`,
  uninstallPackagePrompt: (pkg: string) => `Uninstall '${pkg}'?`,
} as const;
