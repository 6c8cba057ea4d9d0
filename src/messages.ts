import format from 'string-format';
import messagesJson from './messages/messages.json';

interface Messages {
    run_failed: string;
    unexpected_error: string;
    project_root: string;
    reading_standards_document: string;
    failed_to_read_standards_document: string;
    standards_report_path_not_found: string;
    using_standards_report_path: string;
    probing_report_path: string;
    module_report_not_found: string;
    using_module_reports: string;
    using_root_report: string;
    searching_reports_recursively: string;
    found_matching_file: string;
    coverage_report_not_found: string;
    all_reports_failed: string;
    parsing_coverage_report: string;
    failed_to_parse_coverage_report: string;
    failed_to_read_coverage_report: string;
    invalid_counter_attribute: string;
    excluded_classes: string;
    parsed_coverage_report: string;
    invalid_max_parallel: string;
    coverage_result: string;
    worst_classes: string;
}

class Formatter {
    format(template: string, ...args: unknown[]): string {
        return format(template, ...args.map(String));
    }
}

export const messages: Messages = messagesJson;
export const messagesFormatter = new Formatter();
