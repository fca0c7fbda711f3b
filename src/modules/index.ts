export * from "./packages/index.js";
export { BootstrapPackageManagerAction } from "./actions/bootstrap-package-manager.js";
export { InstallPackageAction } from "./actions/install-package.js";
export { CreateUserAction, type CreateUserOptions } from "./actions/create-user.js";
export {
  GenerateSshKeyAction,
  type GenerateSshKeyOptions,
  type SshKeyType,
} from "./actions/generate-ssh-key.js";
export { CopyFileAction, type CopyFileOptions, type TemplateVariables } from "./actions/copy-file.js";
export { EnsureLinesAction, type EnsureLinesOptions } from "./actions/ensure-lines.js";
