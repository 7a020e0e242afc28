/**
 * 全局常量定义
 * 消除魔法数字，集中管理配置值
 */

export const APP_NAME = 'saver';

export const VERSION = '0.3.0';

/** 数据目录与文件名 */
export const STORAGE = {
  /** 默认数据目录（相对 home） */
  DATA_DIR_NAME: '.saver',
  /** 默认数据库文件 */
  DATABASE_FILE: 'captures.db',
  /** 默认配置文件 */
  CONFIG_FILE: 'config.yaml',
} as const;

/** 搜索配置 */
export const SEARCH = {
  /** 默认返回条数 */
  DEFAULT_LIMIT: 50,
  /** 模糊匹配最低分 */
  DEFAULT_MIN_SCORE: 0.3,
  /** 模糊回退扫描倍数（remaining × N 条最近记录） */
  FUZZY_SCAN_MULTIPLIER: 3,
  /** 查询词最短长度（短于此的词不进入 FTS 查询） */
  MIN_TERM_LENGTH: 2,
  /** 部分匹配的最短查询词长度 */
  MIN_PARTIAL_LENGTH: 3,
  /** 摘要窗口长度 */
  SNIPPET_LENGTH: 200,
  /** 摘要省略符 */
  ELLIPSIS: '…',
} as const;

/** 浏览默认值 */
export const BROWSE = {
  RECENT_LIMIT: 50,
  BY_APP_LIMIT: 20,
  TOP_APPS: 5,
} as const;

/** 采集配置默认值 */
export const CAPTURE = {
  /** 定时保存间隔（秒） */
  SAVE_INTERVAL_SECONDS: 300,
  /** 少于该字符数的缓冲区不保存 */
  MIN_CHARS_THRESHOLD: 10,
} as const;

/** 交互式控制台 */
export const CONSOLE = {
  DEFAULT_LIMIT: 10,
  DEFAULT_RECENT: 5,
} as const;
