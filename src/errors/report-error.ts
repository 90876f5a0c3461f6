/**
 * Ways a report can fail to be located or read.
 */
export enum ReportErrorCode {
  PATH_NOT_FOUND = 'path_not_found',
  NO_REPORT_IN_DIRECTORY = 'no_report_in_directory',
  INVALID_REPORT = 'invalid_report',
}

/**
 * Fatal error raised while resolving or loading a report file.
 */
export class ReportError extends Error {
  public readonly code: ReportErrorCode;
  public readonly path: string;

  public constructor(
    message: string,
    code: ReportErrorCode,
    path: string,
    cause?: Error,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'ReportError';
    this.code = code;
    this.path = path;

    Object.setPrototypeOf(this, ReportError.prototype);
  }

  public static pathNotFound(path: string): ReportError {
    return new ReportError(
      `Path not found: ${path}`,
      ReportErrorCode.PATH_NOT_FOUND,
      path,
    );
  }

  public static noReportInDirectory(path: string): ReportError {
    return new ReportError(
      `No report files found in directory: ${path}`,
      ReportErrorCode.NO_REPORT_IN_DIRECTORY,
      path,
    );
  }

  public static invalidJson(path: string, cause?: Error): ReportError {
    return new ReportError(
      `Report is not valid JSON: ${path}`,
      ReportErrorCode.INVALID_REPORT,
      path,
      cause,
    );
  }

  public static notAFeatureList(path: string): ReportError {
    return new ReportError(
      `Report must be a list of features: ${path}`,
      ReportErrorCode.INVALID_REPORT,
      path,
    );
  }
}
