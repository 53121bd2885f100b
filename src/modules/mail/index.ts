/**
 * Mail Module
 * ===========
 * Account emails (verification, password reset).
 */

export * as mailService from "./mail.service.js";
export * from "./mail.templates.js";
