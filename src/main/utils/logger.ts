import log from 'electron-log/node';

// 命令行工具不保存日志文件，诊断信息只输出到控制台
// 默认只显示警告和错误，-verbose 时显示 debug
log.transports.file.level = false;
log.transports.console.level = 'warn';
log.transports.console.format = '{text}';

export function setVerbose(verbose: boolean): void {
  log.transports.console.level = verbose ? 'debug' : 'warn';
}

export default log;
