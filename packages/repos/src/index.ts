export type { IniSection } from "./ini.js";
export { parseIni, IniSyntaxError } from "./ini.js";
export type { RepoCatalog } from "./catalog.js";
export {
  DEFAULT_REPO_DIRS,
  DirectoryRepoCatalog,
  isCountable,
  loadRepos,
  readRepoFile,
  selectCountable,
} from "./catalog.js";
export { buildCountmeUrl, expandRepoVars } from "./vars.js";
