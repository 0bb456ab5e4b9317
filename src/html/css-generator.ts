import type { CSSOptions } from '../types/output.js';

export class CSSGenerator {
  private cssOptions: CSSOptions;

  constructor(cssOptions: Partial<CSSOptions> = {}) {
    const defaults = { includeReset: true, includePrint: true };
    this.cssOptions = { ...defaults, ...cssOptions };
  }

  generate(pageGap: number): string {
    const styles: string[] = [];

    if (this.cssOptions.includeReset) {
      styles.push(this.generateReset());
    }

    styles.push(this.generatePageStyles(pageGap));

    if (this.cssOptions.includePrint) {
      styles.push(this.generatePrintStyles());
    }

    if (this.cssOptions.customStyles) {
      styles.push(this.cssOptions.customStyles);
    }

    return styles.join('\n\n');
  }

  private generateReset(): string {
    return `
* {
  margin: 0;
  padding: 0;
  box-sizing: border-box;
}

body {
  color: #000;
  background-color: #e8e8e8;
}
`;
  }

  private generatePageStyles(pageGap: number): string {
    return `
.pf-document {
  display: flex;
  flex-direction: column;
  align-items: center;
  gap: ${pageGap}px;
  padding: ${pageGap}px 0;
}

.pf-page {
  position: relative;
  overflow: hidden;
  background-color: #fff;
  box-shadow: 0 1px 4px rgba(0, 0, 0, 0.25);
}

.pf-text {
  position: absolute;
  white-space: pre;
  line-height: 1;
}

.pf-rule {
  position: absolute;
  height: 0;
  border-top: 1px solid #000;
}

.pf-image {
  position: absolute;
}

.pf-bbox {
  outline: 1px solid #f00;
}
`;
  }

  private generatePrintStyles(): string {
    return `
@media print {
  body {
    background-color: #fff;
  }

  .pf-document {
    gap: 0;
    padding: 0;
  }

  .pf-page {
    box-shadow: none;
    page-break-after: always;
  }
}
`;
  }
}
