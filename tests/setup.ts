// ============================================================================
// Vitest Global Setup
// 在测试模块加载前设置环境
// ============================================================================

import * as os from 'os';
import * as path from 'path';

// 日志走 stderr，测试默认静默；需要排查时用 SAVER_LOG_LEVEL=debug 覆盖
process.env.SAVER_LOG_LEVEL = process.env.SAVER_LOG_LEVEL || 'silent';

// 不读写真实的 ~/.saver
process.env.SAVER_DATA_DIR = path.join(os.tmpdir(), `saver-test-${process.pid}`);
delete process.env.SAVER_CONFIG;
delete process.env.SAVER_DB_PATH;
