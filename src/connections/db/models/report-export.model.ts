// File export báo cáo; file_path là đường dẫn local hoặc URL http(s)
export interface ReportExport {
  id: string;
  merchant_id: string;
  file_name: string;
  file_path: string;
  expires_at: Date;
  created_at: Date;
}
