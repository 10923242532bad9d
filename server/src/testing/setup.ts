import { setLogLevel } from '../utils/logger';

setLogLevel('error');
