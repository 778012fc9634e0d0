// Directory under the user's home holding .env and the default state file
export const CONVERGE_DIR = '.converge';
